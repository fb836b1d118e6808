/**
 * Shared sweep utilities
 *
 * Contains:
 * - Linear spacing and the forward-and-back detune traversal
 * - Small dense matrix helpers for the correction matrix
 * - Sweep point generators (1-D, 2-D, detune)
 *
 * Everything here is pure; nothing talks to an instrument.
 */

import type { Result, VirtualPoint } from './types.js';
import { Ok, Err, ValidationError } from './types.js';

// ============ Spacing ============

/**
 * `count` evenly spaced values from start to end, both included.
 * The last value is exactly `end`.
 */
export function linspace(start: number, end: number, count: number): number[] {
  if (count <= 0) return [];
  if (count === 1) return [start];
  const step = (end - start) / (count - 1);
  const values: number[] = [];
  for (let i = 0; i < count - 1; i++) {
    values.push(start + i * step);
  }
  values.push(end);
  return values;
}

/**
 * Forward from start to end, then back towards start without repeating
 * either extreme, so that the sequence can loop without a jump.
 *
 *   forwardAndBack(-1, 1, 3) => [-1, 0, 1, 0]
 */
export function forwardAndBack(start: number, end: number, steps: number): number[] {
  const forward = linspace(start, end, steps);
  const backward = forward.slice(1, -1).reverse();
  return [...forward, ...backward];
}

// ============ Matrices ============

export type Matrix = number[][];

export function identity(size: number): Matrix {
  const matrix: Matrix = [];
  for (let row = 0; row < size; row++) {
    const values = new Array<number>(size).fill(0);
    values[row] = 1;
    matrix.push(values);
  }
  return matrix;
}

export function cloneMatrix(matrix: Matrix): Matrix {
  return matrix.map(row => [...row]);
}

/** a · b for square matrices of the same size */
export function multiply(a: Matrix, b: Matrix): Matrix {
  const size = a.length;
  const product: Matrix = [];
  for (let row = 0; row < size; row++) {
    const values: number[] = [];
    for (let col = 0; col < size; col++) {
      let sum = 0;
      for (let k = 0; k < size; k++) {
        sum += a[row][k] * b[k][col];
      }
      values.push(sum);
    }
    product.push(values);
  }
  return product;
}

/** matrix · vector */
export function apply(matrix: Matrix, vector: readonly number[]): number[] {
  return matrix.map(row => row.reduce((sum, factor, col) => sum + factor * vector[col], 0));
}

/** Round to a number of decimals; -0 becomes 0 */
export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  const rounded = Math.round(value * factor) / factor;
  return rounded === 0 ? 0 : rounded;
}

// ============ Sweep Points ============

/** One point per voltage, only the swept contact differs from rest */
export function points1d(contact: string, voltages: readonly number[]): VirtualPoint[] {
  return voltages.map(voltage => ({ [contact]: voltage }));
}

/**
 * Outer-major grid: for each outer voltage, every inner voltage in turn.
 * The inner contact varies fastest.
 */
export function points2d(
  innerContact: string,
  innerVoltages: readonly number[],
  outerContact: string,
  outerVoltages: readonly number[]
): VirtualPoint[] {
  const points: VirtualPoint[] = [];
  for (const outer of outerVoltages) {
    for (const inner of innerVoltages) {
      points.push({ [outerContact]: outer, [innerContact]: inner });
    }
  }
  return points;
}

/**
 * Detune all contacts together, each along forwardAndBack(start[i], end[i], steps).
 */
export function pointsDetune(
  contacts: readonly string[],
  startV: readonly number[],
  endV: readonly number[],
  steps: number
): Result<VirtualPoint[], ValidationError> {
  if (contacts.length === 0) {
    return Err(new ValidationError('Detune needs at least one contact'));
  }
  if (contacts.length !== startV.length) {
    return Err(new ValidationError(`There must be exactly one voltage per contact: startV ${formatList(startV)}`));
  }
  if (contacts.length !== endV.length) {
    return Err(new ValidationError(`There must be exactly one voltage per contact: endV ${formatList(endV)}`));
  }
  if (!Number.isInteger(steps) || steps < 2) {
    return Err(new ValidationError(`Detune needs at least 2 steps, got ${steps}`));
  }

  const traces = contacts.map((_, i) => forwardAndBack(startV[i], endV[i], steps));
  const points: VirtualPoint[] = [];
  for (let step = 0; step < traces[0].length; step++) {
    const point: VirtualPoint = {};
    contacts.forEach((contact, i) => {
      point[contact] = traces[i][step];
    });
    points.push(point);
  }
  return Ok(points);
}

function formatList(values: readonly number[]): string {
  return `[${values.join(', ')}]`;
}
