// ============================================================================
// @fabricate/providers — Science
// ============================================================================

import { BaseProvider, type EnumInputOf, type ProviderOptions } from '@fabricate/core';
import { DATA_DIR } from './data_dir.js';
import { MeasureUnit, MetricPrefixSign } from './enums.js';
import { field, stringList } from './resources.js';

const RNA_NUCLEOTIDES = ['A', 'G', 'U', 'C'];
const DNA_NUCLEOTIDES = ['A', 'G', 'T', 'C'];

export class Science extends BaseProvider {
  constructor(options: ProviderOptions = {}) {
    super({ name: 'science', dataDir: DATA_DIR }, options);
  }

  /** e.g. `AGUGACACAA` */
  rnaSequence(length = 10): string {
    return this.random.choices(RNA_NUCLEOTIDES, length).join('');
  }

  /** e.g. `GCTTTAGACC` */
  dnaSequence(length = 10): string {
    return this.random.choices(DNA_NUCLEOTIDES, length).join('');
  }

  /**
   * SI unit name, or its symbol when `symbol` is set.
   *
   * @throws {EnumResolutionError} If `name` is not a measure unit
   */
  measureUnit(name?: EnumInputOf<typeof MeasureUnit>, symbol = false): string {
    const [unitName, unitSymbol] = this.coerceEnum(name, MeasureUnit);
    return symbol ? unitSymbol : unitName;
  }

  /**
   * SI prefix of the given sign, e.g. `mega` or `M`.
   *
   * @throws {EnumResolutionError} If `sign` is not a prefix sign
   */
  metricPrefix(sign?: EnumInputOf<typeof MetricPrefixSign>, symbol = false): string {
    const resolved = this.coerceEnum(sign, MetricPrefixSign);
    const kind = symbol ? 'symbols' : 'names';
    const data = this.readGlobalResource('si_prefixes.json');
    const prefixes = stringList(field(field(data, kind), resolved), `si_prefixes.json#${kind}`);
    return this.random.choice(prefixes);
  }
}
