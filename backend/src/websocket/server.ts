/**
 * WebSocket Server - Socket.IO event handlers
 */

import { Server as SocketIOServer, Socket } from 'socket.io';
import { z } from 'zod';
import { findMonitorError, errorMessage } from '../errors.js';
import type { Logger } from '../logger.js';
import type { MachineService } from '../machines/MachineService.js';
import { MACHINE_COMMANDS } from '../machines/types.js';
import type { StateManager } from '../state/StateManager.js';

const MachineIdSchema = z.number().int().positive();

const CommandRequestSchema = z.object({
  machineId: MachineIdSchema,
  command: z.enum(MACHINE_COMMANDS),
});

export function setupWebSocket(
  io: SocketIOServer,
  machineService: MachineService,
  stateManager: StateManager,
  logger: Logger
): void {
  io.on('connection', (socket: Socket) => {
    stateManager.registerClient(socket);
    sendInitialData(socket, machineService);

    // =========================================
    // SUBSCRIPTIONS
    // =========================================

    socket.on('subscribe:machine', (raw: unknown) => {
      const machineId = MachineIdSchema.safeParse(raw);
      if (!machineId.success) return;

      stateManager.subscribeToMachine(socket.id, machineId.data);
      socket.emit('subscribed', { machineId: machineId.data });

      const status = machineService.getStatus(machineId.data);
      if (status) {
        socket.emit('machine:status', { machineId: machineId.data, status, timestamp: Date.now() });
      }
    });

    socket.on('unsubscribe:machine', (raw: unknown) => {
      const machineId = MachineIdSchema.safeParse(raw);
      if (!machineId.success) return;

      stateManager.unsubscribeFromMachine(socket.id, machineId.data);
      socket.emit('unsubscribed', { machineId: machineId.data });
    });

    // =========================================
    // COMMANDS
    // =========================================

    socket.on('machine:command', async (raw: unknown) => {
      const request = CommandRequestSchema.safeParse(raw);
      if (!request.success) {
        socket.emit('machine:command:result', {
          success: false,
          error: 'Invalid command request',
          code: 'VALIDATION_ERROR',
        });
        return;
      }

      const { machineId, command } = request.data;
      try {
        await machineService.sendCommand(machineId, command);
        socket.emit('machine:command:result', { machineId, command, success: true });
      } catch (error) {
        const known = findMonitorError(error);
        logger.warn({ err: error, machineId, command }, 'WebSocket machine:command failed');
        socket.emit('machine:command:result', {
          machineId,
          command,
          success: false,
          error: known?.message ?? errorMessage(error),
          code: known?.code ?? 'INTERNAL_ERROR',
        });
      }
    });

    // =========================================
    // STATUS REQUESTS
    // =========================================

    socket.on('machines:get:all', () => {
      sendInitialData(socket, machineService);
    });

    socket.on('ping', () => {
      socket.emit('pong', { timestamp: Date.now() });
    });

    socket.on('disconnect', () => {
      stateManager.unregisterClient(socket.id);
    });
  });
}

function sendInitialData(socket: Socket, machineService: MachineService): void {
  socket.emit('machines:list', { machines: machineService.list() });
  socket.emit('machines:status', { statuses: machineService.getAllStatuses() });
}
