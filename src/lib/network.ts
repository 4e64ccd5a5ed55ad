import assert from 'node:assert/strict';
import { Socket, createConnection } from 'node:net';

import { debugLog, formatBytes } from './utils.js';

// Standard raw printing (JetDirect) port
export const RAW_PRINT_PORT = 9100;

export interface Transport {
  open(host: string, port?: number): Promise<void>;
  write(data: Buffer): Promise<void>;
  close(): void;
  isOpen(): boolean;
}

export class NetworkTransport implements Transport {
  private socket: Socket | null = null;
  open = async (host: string, port = RAW_PRINT_PORT) => {
    if (this.isOpen()) return;

    return new Promise<void>((resolve, reject) => {
      debugLog(`Connecting to ${host}:${port}...`);

      const socket = createConnection({ host, port });
      const handleConnectError = (error: Error) => {
        socket.destroy();
        reject(new Error(`Connection to ${host}:${port} failed; ${error.message}`));
      };

      socket.once('error', handleConnectError);
      socket.once('connect', () => {
        debugLog('Connection success!');
        socket.off('error', handleConnectError);
        // Write errors are reported through write()
        socket.on('error', (error) => debugLog('Socket error:', error.message));
        // An earlier job's socket may close after a new one is open
        socket.on('close', () => {
          if (this.socket === socket) {
            this.socket = null;
          }
        });
        this.socket = socket;
        resolve();
      });
    });
  };
  close = () => {
    if (this.socket) {
      this.socket.end();
      this.socket = null;
    }
  };
  isOpen = () => {
    return Boolean(this.socket && !this.socket.destroyed);
  };
  write = (data: Buffer) => {
    const socket = this.socket;
    assert(socket && !socket.destroyed, 'Transport not open');
    debugLog('Writing:', formatBytes(data));

    return new Promise<void>((resolve, reject) => {
      socket.write(data, (error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  };
}
