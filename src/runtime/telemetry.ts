import WebSocket from 'ws';

import { describeError } from '../pipeline/errors.js';
import type { FrameOutcome } from '../pipeline/progress.js';
import type { Logger } from './logger.js';

export type TelemetryEvent =
  | {
      readonly type: 'job-start';
      readonly jobId: string;
      readonly input: string;
      readonly width: number;
      readonly height: number;
      readonly fps: number;
      readonly frames: number;
      readonly scale: number;
      readonly workers: number;
    }
  | {
      readonly type: 'frame';
      readonly jobId: string;
      readonly frameIndex: number;
      readonly outcome: FrameOutcome;
      readonly frameMs: number;
      readonly settled: number;
      readonly total: number;
    }
  | {
      readonly type: 'job-end';
      readonly jobId: string;
      readonly status: 'ok' | 'failed' | 'cancelled';
      readonly message?: string;
    };

export type TelemetrySink = {
  send(event: TelemetryEvent): void;
  close(): Promise<void>;
};

export const nullTelemetry: TelemetrySink = {
  send: () => {},
  close: async () => {},
};

export type TelemetryOptions = {
  readonly handshakeTimeoutMs?: number;
};

/**
 * Opens a best-effort progress feed. An endpoint that cannot be reached only costs a warning;
 * the job runs the same without it.
 */
export const connectTelemetry = async (
  url: string,
  logger: Logger,
  options: TelemetryOptions = {},
): Promise<TelemetrySink> => {
  let opened = false;
  const socket = new WebSocket(url, { handshakeTimeout: options.handshakeTimeoutMs ?? 5_000 });
  const connected = new Promise<void>((resolve, reject) => {
    socket.once('open', () => {
      opened = true;
      resolve();
    });
    socket.on('error', (error) => {
      if (opened) {
        logger.warn(`[telemetry] ${error.message}`);
      } else {
        reject(error);
      }
    });
  });

  try {
    await connected;
  } catch (error) {
    logger.warn(`[telemetry] could not connect to ${url}: ${describeError(error)}`);
    return nullTelemetry;
  }
  logger.debug(`[telemetry] streaming progress to ${url}`);

  return {
    send: (event) => {
      if (socket.readyState !== WebSocket.OPEN) {
        return;
      }
      socket.send(JSON.stringify(event), (error) => {
        if (error) {
          logger.warn(`[telemetry] dropped ${event.type} event: ${error.message}`);
        }
      });
    },
    close: () =>
      new Promise<void>((resolve) => {
        if (socket.readyState === WebSocket.CLOSED) {
          resolve();
          return;
        }
        socket.once('close', () => resolve());
        socket.close();
      }),
  };
};
