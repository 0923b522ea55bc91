// ============================================================================
// @fabricate/providers — Enums
// ============================================================================

import { defineEnum } from '@fabricate/core';

export const ISBNFormat = defineEnum('ISBNFormat', {
  ISBN10: 'isbn-10',
  ISBN13: 'isbn-13',
} as const);

export const EANFormat = defineEnum('EANFormat', {
  EAN8: 'ean-8',
  EAN13: 'ean-13',
} as const);

export const MetricPrefixSign = defineEnum('MetricPrefixSign', {
  POSITIVE: 'positive',
  NEGATIVE: 'negative',
} as const);

/** SI units as `[name, symbol]`. */
export const MeasureUnit = defineEnum('MeasureUnit', {
  MASS: ['gram', 'gr'],
  INFORMATION: ['byte', 'b'],
  THERMODYNAMIC_TEMPERATURE: ['kelvin', 'K'],
  AMOUNT_OF_SUBSTANCE: ['mole', 'mol'],
  ANGLE: ['radian', 'r'],
  SOLID_ANGLE: ['steradian', '㏛'],
  FREQUENCY: ['hertz', 'Hz'],
  FORCE: ['newton', 'N'],
  PRESSURE: ['pascal', 'P'],
  ENERGY: ['joule', 'J'],
  POWER: ['watt', 'W'],
  ELECTRIC_CHARGE: ['coulomb', 'C'],
  VOLTAGE: ['volt', 'V'],
  ELECTRIC_CAPACITANCE: ['farad', 'F'],
  ELECTRIC_RESISTANCE: ['ohm', 'Ω'],
  ELECTRICAL_CONDUCTANCE: ['siemens', 'S'],
  MAGNETIC_FLUX: ['weber', 'Wb'],
  MAGNETIC_FLUX_DENSITY: ['tesla', 'T'],
  INDUCTANCE: ['henry', 'H'],
  TEMPERATURE: ['Celsius', '°C'],
  RADIOACTIVITY: ['becquerel', 'Bq'],
} as const);
