import { InvalidConfigurationError } from './errors';
import type { ScalingTable } from './types';

export function validateScalingTable(table: ScalingTable): void {
  if (!table.length) {
    throw new InvalidConfigurationError('scaling table is empty');
  }
  if (!(table[0] >= 1)) {
    throw new InvalidConfigurationError('scaling table must start at a multiplier of at least 1', {
      first: table[0],
    });
  }
  table.forEach((multiplier, position) => {
    if (!Number.isFinite(multiplier) || multiplier <= 0) {
      throw new InvalidConfigurationError('scaling multipliers must be positive', { position, multiplier });
    }
  });
}

/**
 * Volume for a ladder layer: the base amount scaled by the multiplier at
 * |layerIndex|, clamped to the last entry of the table.
 */
export function sizeLayer(baseAmount: number, table: ScalingTable, layerIndex: number): number {
  if (!Number.isFinite(baseAmount) || baseAmount <= 0) {
    throw new InvalidConfigurationError('base amount must be positive', { baseAmount });
  }
  validateScalingTable(table);
  const position = Math.min(Math.abs(Math.trunc(layerIndex)), table.length - 1);
  return baseAmount * table[position];
}
