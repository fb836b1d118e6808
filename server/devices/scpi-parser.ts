/**
 * SCPI Response Parser
 *
 * Utilities for parsing SCPI (Standard Commands for Programmable Instruments)
 * responses from the DC source: scalar numbers, comma separated readings,
 * the *IDN? record and the error queue.
 */

import type { Result } from '../../shared/types.js';
import { Ok, Err } from '../../shared/types.js';

export interface Identity {
  manufacturer: string;
  model: string;
  serial: string;
  /** Full firmware field, e.g. "11-0.17.5" (FPGA-firmware) */
  firmware: string;
}

export interface ScpiErrorEntry {
  code: number;
  message: string;
}

export const ScpiParser = {
  /**
   * Parse a numeric SCPI response.
   *
   * Handles standard numeric responses ("1.234", "-5.67E-3") and
   * rejects empty or non-numeric ones.
   */
  parseNumber(response: string): Result<number, string> {
    const trimmed = response.trim();

    if (trimmed === '') {
      return Err('empty response');
    }

    const value = Number(trimmed);

    if (Number.isNaN(value)) {
      return Err(`non-numeric response: "${trimmed}"`);
    }

    return Ok(value);
  },

  /**
   * Parse a comma-separated SCPI response into parts.
   */
  parseCsv(response: string): string[] {
    return response.split(',').map(s => s.trim());
  },

  /**
   * Parse a comma-separated list of numbers, e.g. the answer to
   * "read? (@1,2)" or "sour1:list:volt?". An empty answer is an empty list.
   */
  parseFloats(response: string): Result<number[], string> {
    const trimmed = response.trim();
    if (trimmed === '') return Ok([]);

    const values: number[] = [];
    for (const part of this.parseCsv(trimmed)) {
      const parsed = this.parseNumber(part);
      if (!parsed.ok) return Err(`bad list entry: ${parsed.error}`);
      values.push(parsed.value);
    }
    return Ok(values);
  },

  /**
   * Parse a *IDN? response: "manufacturer,model,serial,firmware".
   */
  parseIdn(response: string): Result<Identity, string> {
    const parts = this.parseCsv(response);
    if (parts.length < 4) {
      return Err(`unexpected *IDN? response: "${response.trim()}"`);
    }
    const [manufacturer, model, serial, firmware] = parts;
    return Ok({ manufacturer, model, serial, firmware });
  },

  /**
   * The instrument firmware reports "FPGA-firmware"; only the part after
   * the first dash is the firmware version proper.
   */
  parseFirmwareVersion(firmware: string): Result<number[], string> {
    const parts = firmware.trim().split('-');
    const version = parts.length > 1 ? parts[1] : parts[0];
    const numbers = version.split('.').map(n => Number.parseInt(n, 10));
    if (numbers.length === 0 || numbers.some(n => Number.isNaN(n))) {
      return Err(`unparsable firmware version: "${firmware}"`);
    }
    return Ok(numbers);
  },

  /** Negative when a < b, zero when equal, positive when a > b */
  compareVersions(a: readonly number[], b: readonly number[]): number {
    const length = Math.max(a.length, b.length);
    for (let i = 0; i < length; i++) {
      const diff = (a[i] ?? 0) - (b[i] ?? 0);
      if (diff !== 0) return diff;
    }
    return 0;
  },

  /**
   * Split the answer to "syst:err:all?" into entries.
   *
   *   '-113,"Undefined header",-222,"Data out of range"'
   *
   * An empty queue ('0,"No error"') gives an empty list.
   */
  parseErrorQueue(response: string): Result<ScpiErrorEntry[], string> {
    const entries: ScpiErrorEntry[] = [];
    const pattern = /([+-]?\d+)\s*,\s*"([^"]*)"/g;
    let consumed = 0;
    for (const match of response.matchAll(pattern)) {
      const code = Number.parseInt(match[1], 10);
      if (code !== 0) entries.push({ code, message: match[2] });
      consumed++;
    }
    if (consumed === 0 && response.trim() !== '') {
      return Err(`unexpected error queue response: "${response.trim()}"`);
    }
    return Ok(entries);
  },
};
