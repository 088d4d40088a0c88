export const Markers = {
  ZERO: "0".charCodeAt(0),
  NINE: "9".charCodeAt(0),
  COLON: ":".charCodeAt(0),
  INTEGER: "i".charCodeAt(0),
  MINUS: "-".charCodeAt(0),
  LIST: "l".charCodeAt(0),
  DICT: "d".charCodeAt(0),
  END: "e".charCodeAt(0),
} as const;

export function isDigit(c: number): boolean {
  return c >= Markers.ZERO && c <= Markers.NINE;
}
