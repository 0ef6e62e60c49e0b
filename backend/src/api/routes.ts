/**
 * REST API Routes
 */

import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { ValidationError } from '../errors.js';
import type { MachineService } from '../machines/MachineService.js';
import { MACHINE_COMMANDS } from '../machines/types.js';
import type { StateManager } from '../state/StateManager.js';

// Async error wrapper
function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

const CommandSchema = z.enum(MACHINE_COMMANDS);

function parseMachineId(raw: string): number {
  const id = Number(raw);
  if (!Number.isInteger(id) || id <= 0) {
    throw new ValidationError(`Invalid machine id "${raw}"`, 'VALIDATION_MACHINE_ID', { id: raw });
  }
  return id;
}

export function createApiRoutes(
  machineService: MachineService,
  stateManager: StateManager
): Router {
  const router = Router();

  // =========================================
  // MACHINES
  // =========================================

  router.get('/machines', (_req: Request, res: Response) => {
    res.json({ machines: machineService.list() });
  });

  router.get('/machines/:id', (req: Request, res: Response) => {
    res.json(machineService.get(parseMachineId(req.params.id)));
  });

  router.post('/machines', asyncHandler(async (req: Request, res: Response) => {
    const machine = await machineService.add(req.body);
    res.status(201).json(machine);
  }));

  router.put('/machines/:id', asyncHandler(async (req: Request, res: Response) => {
    const machine = await machineService.update(parseMachineId(req.params.id), req.body);
    res.json(machine);
  }));

  router.delete('/machines/:id', asyncHandler(async (req: Request, res: Response) => {
    await machineService.remove(parseMachineId(req.params.id));
    res.status(204).end();
  }));

  router.post('/machines/:id/enable', asyncHandler(async (req: Request, res: Response) => {
    res.json(await machineService.setEnabled(parseMachineId(req.params.id), true));
  }));

  router.post('/machines/:id/disable', asyncHandler(async (req: Request, res: Response) => {
    res.json(await machineService.setEnabled(parseMachineId(req.params.id), false));
  }));

  // =========================================
  // STATUS
  // =========================================

  router.get('/status', (_req: Request, res: Response) => {
    res.json({ statuses: machineService.getAllStatuses() });
  });

  router.get('/machines/:id/status', (req: Request, res: Response) => {
    const machineId = parseMachineId(req.params.id);
    const status = machineService.getStatus(machineId);
    if (!status) {
      res.status(404).json({ error: `No status for machine ${machineId}`, code: 'STATUS_NOT_FOUND' });
      return;
    }
    res.json(status);
  });

  // =========================================
  // COMMANDS
  // =========================================

  router.post('/machines/:id/:command', asyncHandler(async (req: Request, res: Response, next: NextFunction) => {
    const command = CommandSchema.safeParse(req.params.command);
    if (!command.success) {
      next();
      return;
    }

    await machineService.sendCommand(parseMachineId(req.params.id), command.data);
    res.json({ success: true });
  }));

  // =========================================
  // META
  // =========================================

  router.get('/provider-types', (_req: Request, res: Response) => {
    res.json({ types: machineService.providerTypes() });
  });

  router.get('/stats', (_req: Request, res: Response) => {
    const machines = machineService.list();
    res.json({
      connectedClients: stateManager.getClientCount(),
      machines: machines.length,
      monitored: machines.filter((m) => m.running).length,
      offline: machineService.getAllStatuses().filter((s) => s.state === 'Offline').length,
    });
  });

  return router;
}
