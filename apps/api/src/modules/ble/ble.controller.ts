import type { Request, Response } from 'express';

import { asyncHandler } from '../../shared/http/async-handler.js';
import { escapeHtml } from '../../shared/http/html.js';
import type { BleService } from './ble.service.js';

const preformatted = (title: string, body: string) =>
  `<!doctype html><html><head><meta charset="utf-8"><title>${escapeHtml(title)}</title></head>` +
  `<body><h1>${escapeHtml(title)}</h1><pre>${escapeHtml(body)}</pre></body></html>`;

export const createBleController = (bleService: BleService) => ({
  lastScan: (_req: Request, res: Response) => {
    const { output, finishedAt } = bleService.getLastScan();
    const title = finishedAt ? `Last scan output (${finishedAt})` : 'No scan has run yet';
    res.type('html').send(preformatted(title, output));
  },

  bluetooth: asyncHandler(async (_req: Request, res: Response) => {
    const status = await bleService.adapterStatus();
    res.type('html').send(preformatted('Bluetooth adapter', status));
  }),
});
