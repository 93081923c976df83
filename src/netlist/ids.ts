/**
 * Identifier escaping.
 *
 * Design-level names are stored escaped: public names carry a leading
 * backslash, generated names start with `$`. Names that already start
 * with either character are kept as they are.
 */

export const escapeId = (name: string): string =>
  name.startsWith("\\") || name.startsWith("$") ? name : `\\${name}`;

/**
 * Display form of an escaped name: drops the backslash of public names.
 */
export const unescapeId = (name: string): string =>
  name.startsWith("\\") ? name.slice(1) : name;

/** Prefix of wire names generated while importing JSON netlists. */
export const AUTO_ID_PREFIX = "$auto$json$";
