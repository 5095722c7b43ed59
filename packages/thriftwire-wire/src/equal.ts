import type { WireValue } from "./types.ts";
import { WireType } from "./types.ts";

function doublesEqual(a: number, b: number): boolean {
  if (Number.isNaN(a) && Number.isNaN(b)) return true;
  return Object.is(a, b);
}

function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

function sequencesEqual(a: WireValue[], b: WireValue[]): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (!valuesEqual(a[i], b[i])) return false;
  }
  return true;
}

/**
 * Structural equality of two wire values.
 *
 * Order matters for struct fields, map items and set/list elements. Any two
 * NaN doubles are equal; `0` and `-0` are not.
 */
export function valuesEqual(a: WireValue, b: WireValue): boolean {
  switch (a.type) {
    case WireType.BOOL:
      return b.type === WireType.BOOL && a.value === b.value;
    case WireType.I8:
      return b.type === WireType.I8 && a.value === b.value;
    case WireType.I16:
      return b.type === WireType.I16 && a.value === b.value;
    case WireType.I32:
      return b.type === WireType.I32 && a.value === b.value;
    case WireType.I64:
      return b.type === WireType.I64 && a.value === b.value;
    case WireType.DOUBLE:
      return b.type === WireType.DOUBLE && doublesEqual(a.value, b.value);
    case WireType.BINARY:
      return b.type === WireType.BINARY && bytesEqual(a.value, b.value);
    case WireType.STRUCT: {
      if (b.type !== WireType.STRUCT || a.fields.length !== b.fields.length) return false;
      for (let i = 0; i < a.fields.length; i++) {
        const fa = a.fields[i];
        const fb = b.fields[i];
        if (fa.id !== fb.id || !valuesEqual(fa.value, fb.value)) return false;
      }
      return true;
    }
    case WireType.MAP: {
      if (
        b.type !== WireType.MAP ||
        a.keyType !== b.keyType ||
        a.valueType !== b.valueType ||
        a.items.length !== b.items.length
      ) {
        return false;
      }
      for (let i = 0; i < a.items.length; i++) {
        const ia = a.items[i];
        const ib = b.items[i];
        if (!valuesEqual(ia.key, ib.key) || !valuesEqual(ia.value, ib.value)) return false;
      }
      return true;
    }
    case WireType.SET:
      return (
        b.type === WireType.SET &&
        a.valueType === b.valueType &&
        sequencesEqual(a.elements, b.elements)
      );
    case WireType.LIST:
      return (
        b.type === WireType.LIST &&
        a.valueType === b.valueType &&
        sequencesEqual(a.elements, b.elements)
      );
  }
}
