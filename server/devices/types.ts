// Re-export shared types
export * from '../../shared/types.js';

import type { Result } from '../../shared/types.js';
import type { ScpiCommand } from './scpi-command.js';

// Server-only types

export interface Transport {
  open(): Promise<Result<void, Error>>;
  close(): Promise<Result<void, Error>>;
  query(cmd: string): Promise<Result<string, Error>>;
  write(cmd: string): Promise<Result<void, Error>>;
  isOpen(): boolean;
}

/** An internal trigger line, numbered from 1 */
export interface InternalTrigger {
  readonly value: number;
}

/**
 * Where channel proxies and arrangements send their commands.
 * Commands are sent in order; the first failure stops the rest.
 */
export interface CommandSink {
  /** Opaque unique instrument name */
  readonly name: string;
  send(...commands: ScpiCommand[]): Promise<Result<void, Error>>;
  ask(command: ScpiCommand): Promise<Result<string, Error>>;
}

/** Error type for probe failures with specific reason codes */
export interface ProbeError {
  reason: 'timeout' | 'wrong_device' | 'incompatible_firmware' | 'parse_error' | 'connection_failed';
  message: string;
}

export interface InstrumentInfo {
  /** Opaque unique name, used to route commands to the right instrument */
  name: string;
  manufacturer: string;
  model: string;
  serial?: string;
  firmware?: string;
}

export interface SerialOptions {
  baudRate?: number;           // Default: 921600
  commandDelay?: number;       // ms delay between commands (default: 0)
  timeout?: number;            // Query timeout in ms (default: 2000)
}
