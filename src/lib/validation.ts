const OID_REGEX = /^[0-9a-f]{64}$/;
const CONTENT_RANGE_REGEX = /^bytes (\d+)-(\d+)\/(\d+|\*)$/;
const DIGITS_REGEX = /^\d+$/;

export function isValidOID(oid: string): boolean {
  return OID_REGEX.test(oid);
}

export function isValidSize(size: number): boolean {
  return Number.isInteger(size) && size >= 0;
}

/**
 * Byte count a client declares for an upload body: `Content-Length`, or the
 * span of a single `Content-Range` when no length is given.
 */
export function parseDeclaredLength(headers: Headers): number | null {
  const length = headers.get("Content-Length");
  if (length !== null) {
    const trimmed = length.trim();
    return DIGITS_REGEX.test(trimmed) ? Number.parseInt(trimmed, 10) : null;
  }

  const range = headers.get("Content-Range");
  if (range === null) return null;

  const match = CONTENT_RANGE_REGEX.exec(range.trim());
  if (!match) return null;

  const first = Number.parseInt(match[1] ?? "", 10);
  const last = Number.parseInt(match[2] ?? "", 10);
  if (last < first) return null;

  return last - first + 1;
}
