export type LocusConfig = {
  /** Location texts given as arguments. Empty means read them from stdin. */
  locations: string[];
  /** Prefix each canonical form with its variant kind. */
  showKind: boolean;
  /** Log interner statistics when the run ends. */
  stats: boolean;
  /** Name of the input in diagnostics. */
  file: string;
  color: boolean;
};
