export type EntityId = string;

const INTEGRAL_PATTERN = /^([+-]?)(\d+)(?:\.0*)?$/;

function integerString(sign: string, digits: string): string {
  const value = BigInt(digits);
  if (value === 0n) {
    return '0';
  }
  return sign === '-' ? `-${value.toString()}` : value.toString();
}

/**
 * Canonical string form of an entity identifier. Upstream payloads emit ids
 * as integers, floats or numeric strings; all integral forms collapse to the
 * plain integer string (`123`, `123.0`, `"123"`, `"123.0"` → `"123"`).
 * Returns `null` for anything that cannot act as a key.
 */
export function normalizeEntityId(value: unknown): EntityId | null {
  if (typeof value === 'bigint') {
    return value.toString();
  }

  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      return null;
    }
    if (Number.isInteger(value)) {
      return Number.isSafeInteger(value) ? String(value) : BigInt(value).toString();
    }
    return String(value);
  }

  if (typeof value !== 'string') {
    return null;
  }

  const trimmed = value.trim();
  if (trimmed.length === 0) {
    return null;
  }

  const match = INTEGRAL_PATTERN.exec(trimmed);
  if (match) {
    return integerString(match[1], match[2]);
  }

  return trimmed;
}

export function placeholderDisplayName(entityId: EntityId): string {
  return `Room ${entityId}`;
}
