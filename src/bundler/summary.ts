/** The parts of a webpack Stats object a summary reads */
export interface StatsSource {
  hash?: string;
  compilation: {
    name?: string;
    errors: readonly unknown[];
    warnings: readonly unknown[];
    assets: Record<string, unknown>;
  };
}

export type CompilationSummary = {
  name: string | null;
  hash: string | null;
  errors: number;
  warnings: number;
  assets: string[];
};

/** One result payload entry per compilation */
export function summarizeStats(stats: readonly StatsSource[]): CompilationSummary[] {
  return stats.map(({ hash, compilation }) => ({
    name: compilation.name ?? null,
    hash: hash ?? null,
    errors: compilation.errors.length,
    warnings: compilation.warnings.length,
    assets: Object.keys(compilation.assets).sort(),
  }));
}
