export { formatValue } from "./format-value"
export {
  type FromNativeOptions,
  fromNative,
  type ToNativeOptions,
  toNative,
  toNativeTable,
} from "./native"
export { formatPath, lookup, type Path, parsePath, setPath } from "./path"
export {
  array,
  bool,
  cloneValue,
  float,
  int,
  isTable,
  kindOf,
  nullValue,
  str,
  table,
  tableEntries,
  tableKeys,
  valueEquals,
} from "./value"
