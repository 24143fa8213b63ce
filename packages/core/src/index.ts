export {
  Value,
  type Quote,
  type Sym,
  sym,
  INTEGER_MIN,
  INTEGER_MAX,
  inIntegerRange,
} from './value.js';
export { valueEquals, symbolEquals } from './equal.js';
export { printValue, printSymbol, QUOTE_MARKERS, REST_MARKER } from './print.js';
