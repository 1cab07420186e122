import { z } from 'zod';

const globList = z.array(z.string().min(1)).max(200);

const coverageUnitSchema = z
  .object({
    id: z.string().min(1),
    tests: z.array(z.string().min(1)),
    dependencies: z.array(z.string().min(1)),
  })
  .strict();

export const mutaformConfigSchema = z
  .object({
    sources: z
      .object({
        include: globList.optional(),
        exclude: globList.optional(),
      })
      .strict()
      .optional(),

    operators: z
      .object({
        preset: z.enum(['minimal', 'standard', 'all']).optional(),
        include: z.array(z.string().min(1)).optional(),
        exclude: z.array(z.string().min(1)).optional(),
      })
      .strict()
      .optional(),

    clustering: z
      .object({
        enabled: z.boolean().optional(),
        key: z.enum(['operator', 'location', 'shape']).optional(),
        prefix_depth: z.number().int().min(0).max(32).optional(),
      })
      .strict()
      .optional(),

    schemata: z
      .object({
        enabled: z.boolean().optional(),
        selector: z
          .string()
          .regex(/^[^\s()[\]{}"';`~@^]+$/, 'Selector must be a single symbol')
          .optional(),
        max_batch_size: z.number().int().min(1).max(10000).optional(),
      })
      .strict()
      .optional(),

    execution: z
      .object({
        timeout_ms: z.number().int().min(1).max(3_600_000).optional(),
        test_concurrency: z.number().int().min(1).max(64).optional(),
      })
      .strict()
      .optional(),

    coverage: z
      .object({
        trace_file: z.string().min(1).optional(),
        bridge_file: z.string().min(1).optional(),
        units: z.array(coverageUnitSchema).optional(),
      })
      .strict()
      .optional(),

    incremental: z.boolean().optional(),

    state_dir: z.string().min(1).optional(),

    runner: z
      .object({
        test_command: z.string().min(1).max(1000).optional(),
        reload_command: z.string().min(1).max(1000).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type MutaformConfigInput = z.input<typeof mutaformConfigSchema>;

export const CONFIG_SECTIONS = Object.keys(mutaformConfigSchema.shape);
