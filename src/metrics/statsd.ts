import dgram from 'node:dgram';
import { performance } from 'node:perf_hooks';
import type { Logger } from 'pino';
import { metricsLogger } from '../logger.js';
import { DEFAULT_STATSD_PREFIX, type StatsdConfig } from '../config/index.js';

export const SEND_FAILURE_LOG_INTERVAL_MS = 60_000;

export interface DatagramSocket {
  send(message: Buffer, port: number, address: string, callback: (error: Error | null) => void): void;
  on(event: 'error', listener: (error: Error) => void): unknown;
  unref(): unknown;
  close(): unknown;
}

export type UdpStatsSinkOptions = Partial<StatsdConfig> & {
  logger?: Logger;
  createSocket?: () => DatagramSocket;
  now?: () => number;
};

function createUdpSocket(): DatagramSocket {
  return dgram.createSocket('udp4');
}

/**
 * Fire-and-forget StatsD-style line sink. Every public call returns
 * immediately; delivery failures are only visible as a rate-limited warning.
 */
export class UdpStatsSink {
  readonly enabled: boolean;
  private readonly host: string;
  private readonly port: number;
  private readonly prefix: string;
  private readonly log: Logger;
  private readonly socketFactory: () => DatagramSocket;
  private readonly now: () => number;
  private socket: DatagramSocket | null = null;
  private lastFailureLogAt: number | null = null;

  constructor(options: UdpStatsSinkOptions = {}) {
    this.enabled = options.enabled ?? false;
    this.host = options.host ?? '127.0.0.1';
    this.port = options.port ?? 8125;
    this.prefix = options.prefix ?? DEFAULT_STATSD_PREFIX;
    this.log = options.logger ?? metricsLogger;
    this.socketFactory = options.createSocket ?? createUdpSocket;
    this.now = options.now ?? (() => performance.now());
  }

  counter(name: string, value = 1) {
    if (!Number.isFinite(value) || value <= 0) {
      return;
    }
    const amount = Math.trunc(value);
    if (amount <= 0) {
      return;
    }
    this.send(`${this.metricName(name)}:${amount}|c`);
  }

  timing(name: string, valueMs: number) {
    if (!Number.isFinite(valueMs) || valueMs < 0) {
      return;
    }
    this.send(`${this.metricName(name)}:${valueMs.toFixed(2)}|ms`);
  }

  metricName(name: string): string {
    const cleaned = name
      .trim()
      .replace(/[^A-Za-z0-9_.-]+/g, '_')
      .replace(/^[._]+|[._]+$/g, '');
    return `${this.prefix}.${cleaned || 'metric'}`;
  }

  close() {
    const socket = this.socket;
    this.socket = null;
    if (!socket) {
      return;
    }
    try {
      socket.close();
    } catch (error) {
      this.log.debug({ err: error }, 'StatsD socket already closed');
    }
  }

  private send(line: string) {
    if (!this.enabled) {
      return;
    }
    try {
      const socket = this.ensureSocket();
      socket.send(Buffer.from(line, 'utf8'), this.port, this.host, error => {
        if (error) {
          this.reportFailure(error);
        }
      });
    } catch (error) {
      this.reportFailure(error);
    }
  }

  private ensureSocket(): DatagramSocket {
    if (this.socket) {
      return this.socket;
    }
    const socket = this.socketFactory();
    socket.on('error', error => {
      this.reportFailure(error);
    });
    socket.unref();
    this.socket = socket;
    return socket;
  }

  private reportFailure(error: unknown) {
    const now = this.now();
    if (this.lastFailureLogAt !== null && now - this.lastFailureLogAt < SEND_FAILURE_LOG_INTERVAL_MS) {
      return;
    }
    this.lastFailureLogAt = now;
    this.log.warn({ err: error, host: this.host, port: this.port }, 'Failed to emit StatsD metric');
  }
}

export default UdpStatsSink;
