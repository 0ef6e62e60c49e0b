/**
 * State Manager - pushes current-state table changes to Socket.IO clients
 */

import { Server as SocketIOServer, Socket } from 'socket.io';
import { createLogger, type Logger } from '../logger.js';
import type { StateChange, StateReconciler } from '../monitoring/StateReconciler.js';

export interface ClientInfo {
  id: string;
  socket: Socket;
  subscribedMachines: Set<number>;
}

export function machineRoom(machineId: number): string {
  return `machine:${machineId}`;
}

export class StateManager {
  private io: SocketIOServer;
  private clients: Map<string, ClientInfo> = new Map();
  private logger: Logger;
  private unsubscribe: (() => void) | null = null;

  constructor(io: SocketIOServer, logger?: Logger) {
    this.io = io;
    this.logger = (logger ?? createLogger('state')).child({ component: 'state' });
  }

  /** Starts forwarding reconciler changes to clients. */
  attach(reconciler: StateReconciler): void {
    this.unsubscribe?.();
    this.unsubscribe = reconciler.subscribe((change) => this.handleChange(change));
  }

  // =========================================
  // CLIENT MANAGEMENT
  // =========================================

  registerClient(socket: Socket): void {
    this.clients.set(socket.id, {
      id: socket.id,
      socket,
      subscribedMachines: new Set(),
    });
    this.logger.debug({ clientId: socket.id }, 'Client connected');
  }

  unregisterClient(socketId: string): void {
    this.clients.delete(socketId);
    this.logger.debug({ clientId: socketId }, 'Client disconnected');
  }

  subscribeToMachine(socketId: string, machineId: number): void {
    const client = this.clients.get(socketId);
    if (client) {
      client.subscribedMachines.add(machineId);
      void client.socket.join(machineRoom(machineId));
    }
  }

  unsubscribeFromMachine(socketId: string, machineId: number): void {
    const client = this.clients.get(socketId);
    if (client) {
      client.subscribedMachines.delete(machineId);
      void client.socket.leave(machineRoom(machineId));
    }
  }

  // =========================================
  // BROADCAST
  // =========================================

  broadcastToAll(event: string, data: unknown): void {
    this.io.emit(event, data);
  }

  broadcastToMachine(machineId: number, event: string, data: unknown): void {
    this.io.to(machineRoom(machineId)).emit(event, data);
  }

  private handleChange(change: StateChange): void {
    const timestamp = Date.now();

    if (change.type === 'removed') {
      this.broadcastToAll('machine:removed', { machineId: change.machineId, timestamp });
      return;
    }

    const payload = { machineId: change.machineId, status: change.status, timestamp };
    this.broadcastToAll('machine:status', payload);

    // Subscribers of a machine additionally get transitions only
    if (change.changed) {
      this.broadcastToMachine(change.machineId, 'machine:status:changed', {
        ...payload,
        previous: change.previous ?? null,
      });
    }

    if (change.previous && change.previous.state !== change.status.state) {
      this.broadcastToAll('machine:state_change', {
        machineId: change.machineId,
        oldState: change.previous.state,
        newState: change.status.state,
        timestamp,
      });
    }
  }

  // =========================================
  // STATS
  // =========================================

  getClientCount(): number {
    return this.clients.size;
  }

  getSubscribedClients(machineId: number): number {
    let count = 0;
    for (const client of this.clients.values()) {
      if (client.subscribedMachines.has(machineId)) {
        count++;
      }
    }
    return count;
  }

  cleanup(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
    this.clients.clear();
  }
}
