import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { z } from 'zod';
import { InvalidOptionsError } from './errors.js';
import { MERGE_STRATEGIES } from './structure.js';

export const CONFIG_FILE = 'svgpack.config.json';

const MiB = 1024 * 1024;

export const SvgpackConfigSchema = z
  .object({
    maxFileSize: z.number().int().positive().default(10 * MiB),
    maxTotalSize: z.number().int().positive().default(100 * MiB),
    compress: z.boolean().default(false),
    strategy: z.enum(MERGE_STRATEGIES).default('preserve'),
    /** Written to metadata.creator on import when no creator is set */
    creator: z.string().optional(),
    /** Extra names or globs skipped during directory import */
    exclude: z.array(z.string()).default(['*.pyc', '*.tmp', '*.log']),
  })
  .strict();

export type SvgpackConfig = z.output<typeof SvgpackConfigSchema>;

export interface LoadConfigOptions {
  cwd?: string;
  /** Explicit file; overrides SVGPACK_CONFIG */
  path?: string;
  env?: NodeJS.ProcessEnv;
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Load configuration. A missing default file gives the defaults; a missing
 * explicit file, bad JSON or unknown keys throw InvalidOptionsError.
 */
export async function loadConfig(opts: LoadConfigOptions = {}): Promise<SvgpackConfig> {
  const env = opts.env ?? process.env;
  const explicit = opts.path ?? env.SVGPACK_CONFIG;
  const file = resolve(opts.cwd ?? process.cwd(), explicit ?? CONFIG_FILE);

  let text: string;
  try {
    text = await readFile(file, 'utf8');
  } catch (err) {
    if (isMissing(err) && explicit === undefined) return SvgpackConfigSchema.parse({});
    if (isMissing(err)) throw new InvalidOptionsError(`config ${file}`, ['file not found']);
    throw err;
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new InvalidOptionsError(`config ${file}`, [err instanceof Error ? err.message : String(err)]);
  }

  const parsed = SvgpackConfigSchema.safeParse(json);
  if (!parsed.success) {
    throw new InvalidOptionsError(
      `config ${file}`,
      parsed.error.issues.map(i => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message)),
    );
  }
  return parsed.data;
}
