import type { Request, Response } from 'express';

import type { StatusService } from './status.service.js';

export const createStatusController = (statusService: StatusService) => ({
  getStatus: (_req: Request, res: Response) => {
    res.set('Cache-Control', 'no-store').json(statusService.getStatus());
  },
});
