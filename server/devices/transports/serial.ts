/**
 * Serial Transport
 * Line-oriented SCPI over the QDAC-II's USB serial port
 */

import { SerialPort } from 'serialport';
import { ReadlineParser } from '@serialport/parser-readline';
import type { SerialOptions, Transport } from '../types.js';
import type { Result } from '../../../shared/types.js';
import { Ok, Err } from '../../../shared/types.js';
import { loadConfigFromEnv } from '../../config.js';

export interface SerialConfig extends SerialOptions {
  path: string;
}

interface OpenPort {
  port: SerialPort;
  parser: ReadlineParser;
}

const toError = (e: unknown): Error => (e instanceof Error ? e : new Error(String(e)));

export function createSerialTransport(config: SerialConfig): Transport {
  const env = loadConfigFromEnv();
  const path = config.path;
  const baudRate = config.baudRate ?? env.serialBaud;
  const commandDelay = config.commandDelay ?? env.commandDelayMs;
  const timeout = config.timeout ?? env.timeoutMs;

  let current: OpenPort | null = null;
  let opened = false;
  let disconnectError: Error | null = null;

  // Commands and their answers must not interleave
  let commandLock: Promise<void> = Promise.resolve();

  const delay = (ms: number) => new Promise(r => setTimeout(r, ms));

  function withLock<T>(fn: () => Promise<T>): Promise<T> {
    const run = commandLock.then(fn);
    commandLock = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  function ready(): Result<OpenPort, Error> {
    if (disconnectError) return Err(disconnectError);
    if (!current) return Err(new Error('Port not opened'));
    return Ok(current);
  }

  function writeLine(port: SerialPort, cmd: string): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      port.write(`${cmd}\n`, err => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  // Write a query and wait for its answer; settles exactly once
  function exchange(port: SerialPort, parser: ReadlineParser, cmd: string): Promise<string> {
    return new Promise<string>((resolve, reject) => {
      let settled = false;

      const cleanup = () => {
        settled = true;
        clearTimeout(timeoutId);
        parser.removeListener('data', onData);
      };

      const onData = (data: string) => {
        if (settled) return;
        cleanup();
        resolve(data.trim());
      };

      const timeoutId = setTimeout(() => {
        if (settled) return;
        cleanup();
        reject(new Error(`Timeout waiting for response to: ${cmd}`));
      }, timeout);

      parser.once('data', onData);

      port.write(`${cmd}\n`, err => {
        if (!err || settled) return;
        cleanup();
        reject(err);
      });
    });
  }

  return {
    async open(): Promise<Result<void, Error>> {
      if (opened) return Ok();

      const port = new SerialPort({ path, baudRate, autoOpen: false });

      port.on('close', () => {
        disconnectError = new Error('SERIAL_PORT_DISCONNECTED: Port closed');
        opened = false;
      });

      port.on('error', err => {
        disconnectError = new Error(`SERIAL_PORT_ERROR: ${err.message}`);
      });

      const parser = port.pipe(new ReadlineParser({ delimiter: '\n' }));

      try {
        await new Promise<void>((resolve, reject) => {
          port.open(err => {
            if (err) reject(err);
            else resolve();
          });
        });
      } catch (e) {
        return Err(toError(e));
      }

      current = { port, parser };
      opened = true;
      disconnectError = null;
      console.log(`[Serial] Opened ${path} at ${baudRate} baud`);
      return Ok();
    },

    async close(): Promise<Result<void, Error>> {
      if (!current) return Ok();

      // Wait for any in-flight command
      await withLock(async () => {
        if (!current) return;
        const { port, parser } = current;
        parser.removeAllListeners();
        port.removeAllListeners();

        if (opened && !disconnectError) {
          await new Promise<void>(resolve => {
            port.close(() => resolve());
          });
        }

        current = null;
        opened = false;
        disconnectError = null;
      });
      return Ok();
    },

    async query(cmd: string): Promise<Result<string, Error>> {
      return withLock(async () => {
        const line = ready();
        if (!line.ok) return line;
        const { port, parser } = line.value;

        let answer: string;
        try {
          answer = await exchange(port, parser, cmd);
        } catch (e) {
          return Err(toError(e));
        }

        if (commandDelay > 0) await delay(commandDelay);
        return Ok(answer);
      });
    },

    async write(cmd: string): Promise<Result<void, Error>> {
      return withLock(async () => {
        const line = ready();
        if (!line.ok) return line;

        try {
          await writeLine(line.value.port, cmd);
        } catch (e) {
          return Err(toError(e));
        }

        if (commandDelay > 0) await delay(commandDelay);
        return Ok();
      });
    },

    isOpen(): boolean {
      return opened && !disconnectError;
    },
  };
}

/** Find the serial port whose path or manufacturer matches */
export async function findSerialPort(pattern: RegExp): Promise<string | null> {
  const ports = await SerialPort.list();
  const match = ports.find(p => pattern.test(p.path) || pattern.test(p.manufacturer ?? ''));
  return match?.path ?? null;
}
