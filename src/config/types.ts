/**
 * In-memory model of a parsed TOML document.
 */

export type TConfigValue =
  | { kind: 'string'; value: string }
  | { kind: 'integer'; value: number | bigint }
  | { kind: 'float'; value: number }
  | { kind: 'boolean'; value: boolean }
  /** Literal text, e.g. `1979-05-27T00:32:00-07:00` or `07:32:00` */
  | { kind: 'datetime'; value: string }
  | { kind: 'array'; items: readonly TConfigValue[] }
  | { kind: 'table'; entries: TConfigTable };

/** Key → value mapping, in document order */
export type TConfigTable = Readonly<Record<string, TConfigValue>>;

/** Location of a key inside a document, outermost segment first */
export type TKeyPath = readonly string[];
