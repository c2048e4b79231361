export const MEDIA_PROBER = Symbol('MEDIA_PROBER');

/** Loosely-typed prober output: a `format` section and a `streams` list. */
export type ProbeTree = Record<string, unknown>;

export interface MediaProber {
  probe(filePath: string): Promise<ProbeTree>;
}
