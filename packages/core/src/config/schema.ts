import { z } from 'zod';

/**
 * Source-file extensions tried, in order, when a relative import has none.
 */
export const DEFAULT_RESOLVE_EXTENSIONS = ['.py', '.js', '.ts', '.jsx', '.tsx', '.mjs', '.cjs'];

/**
 * Directory entry points tried, in order, after the extensions.
 */
export const DEFAULT_INDEX_FILES = ['index.js', 'index.ts', 'index.tsx', '__init__.py'];

const resolutionSchema = z
  .object({
    extensions: z
      .array(z.string().regex(/^\.[\w.+-]+$/, 'extensions must start with a dot'))
      .default(DEFAULT_RESOLVE_EXTENSIONS),
    indexFiles: z
      .array(z.string().min(1).refine(name => !name.includes('/'), 'index files must be bare file names'))
      .default(DEFAULT_INDEX_FILES),
  })
  .default({});

const unusedSchema = z
  .object({
    // Exported / public names are reported too unless this is turned off.
    includeExported: z.boolean().default(true),
  })
  .default({});

export const analysisConfigSchema = z.object({
  resolution: resolutionSchema,
  unused: unusedSchema,
});

/** Fully populated configuration consumed by the resolver and analyzer. */
export type AnalysisConfig = z.infer<typeof analysisConfigSchema>;

/** Partial overrides accepted by {@link createConfig}. */
export type AnalysisConfigInput = z.input<typeof analysisConfigSchema>;
