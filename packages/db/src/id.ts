import KSUID from "ksuid";

function normalizeTag(tag: string): string {
  return tag
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9_]/g, "_")
    .replace(/^_+|_+$/g, "");
}

/**
 * KSUID-based id generator.
 *
 * - With no tag: `<27-char KSUID>`
 * - With tag: `writing_<27-char KSUID>`
 *
 * KSUIDs are base62, so ids never contain the `:` or `*` characters that
 * cache keys and cache key patterns are built from.
 */
export function generateId(tag = ""): string {
  const ksuid = KSUID.randomSync().string;
  const safeTag = normalizeTag(tag);
  return safeTag ? `${safeTag}_${ksuid}` : ksuid;
}
