// ============================================================================
// @fabricate/providers — Public API
// ============================================================================

export { Code } from './code.js';
export { Science } from './science.js';
export { Text } from './text.js';
export { ISBNFormat, EANFormat, MeasureUnit, MetricPrefixSign } from './enums.js';
export { luhnChecksum } from './luhn.js';
export { DATA_DIR } from './data_dir.js';
