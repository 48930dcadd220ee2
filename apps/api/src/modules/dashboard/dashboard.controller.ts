import type { ClientModeInput } from '@vampgotchi/common';
import type { Request, Response } from 'express';

import { asyncHandler } from '../../shared/http/async-handler.js';
import type { AttackInput } from '../ble/ble.schemas.js';
import type { BleService } from '../ble/ble.service.js';
import type { NetworkService } from '../network/network.service.js';

export type RenderPage = (notice?: string) => string;

export interface DashboardControllerDependencies {
  ble: BleService;
  network: NetworkService;
  render: RenderPage;
}

/** Every command answers with the freshly rendered dashboard. */
export const createDashboardController = ({ ble, network, render }: DashboardControllerDependencies) => {
  const page = (res: Response, notice?: string) => {
    res.type('html').send(render(notice));
  };

  return {
    index: (_req: Request, res: Response) => page(res),

    scan: (_req: Request, res: Response) => {
      const result = ble.startScan();
      page(res, result === 'started' ? 'Scan started' : 'A scan is already running');
    },

    attack: asyncHandler(async (req: Request, res: Response) => {
      const { mac }: AttackInput = req.body;
      await ble.startAttack(mac);
      page(res, `Attacking ${mac}`);
    }),

    stop: asyncHandler(async (_req: Request, res: Response) => {
      const stopped = await ble.stopAttack();
      page(res, stopped ? 'Attack stopped' : 'No attack running');
    }),

    setAccessPoint: (_req: Request, res: Response) => {
      const result = network.startSwitchToAp();
      page(res, result === 'started' ? 'Switching to access point mode' : 'A network switch is already running');
    },

    setClient: (req: Request, res: Response) => {
      const input: ClientModeInput = req.body;
      const result = network.startSwitchToClient(input);
      page(res, result === 'started' ? `Joining ${input.ssid}` : 'A network switch is already running');
    },
  };
};
