import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';

import Ajv, { type JSONSchemaType } from 'ajv';

import { ConfigError, errorMessage } from '@/reposync/lib/errors';
import { isMissingFileError } from '@/reposync/lib/fs';
import { createLogger, type Logger } from '@/reposync/lib/logger';

export const RECENT_LIMIT = 10;

export type PersistedConfig = {
  target_dir?: string;
  source_dirs?: string[];
  default_owner?: string;
  recent_owners?: string[];
  recent_templates?: string[];
};

export const PERSISTED_CONFIG_KEYS = [
  'target_dir',
  'source_dirs',
  'default_owner',
  'recent_owners',
  'recent_templates',
] as const;

const persistedConfigSchema: JSONSchemaType<PersistedConfig> = {
  type: 'object',
  properties: {
    target_dir: { type: 'string', nullable: true },
    source_dirs: { type: 'array', items: { type: 'string' }, nullable: true },
    default_owner: { type: 'string', nullable: true },
    recent_owners: { type: 'array', items: { type: 'string' }, nullable: true },
    recent_templates: { type: 'array', items: { type: 'string' }, nullable: true },
  },
  required: [],
  additionalProperties: true,
};

const ajv = new Ajv({ allErrors: true });
const validatePersistedConfig = ajv.compile(persistedConfigSchema);

/** Most-recent-first, exact duplicates removed, at most `limit` entries. */
export const addRecent = (list: readonly string[] | undefined, entry: string, limit = RECENT_LIMIT): string[] =>
  [entry, ...(list ?? []).filter((existing) => existing !== entry)].slice(0, limit);

/**
 * Reads and writes the JSON settings file. Updates are applied one at a time
 * so concurrent recent-list writes never overwrite each other.
 */
export class ConfigStore {
  private pending: Promise<unknown> = Promise.resolve();

  constructor(
    readonly filePath: string,
    private readonly logger: Logger = createLogger('[config] '),
  ) {}

  async load(): Promise<PersistedConfig> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFileError(error)) {
        this.logger.debug(`no config at ${this.filePath}`);
        return {};
      }
      throw new ConfigError(`Unable to read ${this.filePath}: ${errorMessage(error)}`, this.filePath);
    }

    if (!raw.trim()) {
      return {};
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new ConfigError(`Invalid JSON in ${this.filePath}: ${errorMessage(error)}`, this.filePath);
    }

    if (!validatePersistedConfig(parsed)) {
      const details = ajv.errorsText(validatePersistedConfig.errors, { dataVar: 'config' });
      throw new ConfigError(`Invalid config in ${this.filePath}: ${details}`, this.filePath);
    }

    return parsed;
  }

  async save(config: PersistedConfig): Promise<void> {
    await mkdir(path.dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, `${JSON.stringify(config, null, 2)}\n`, 'utf8');
    this.logger.debug(`saved config to ${this.filePath}`);
  }

  update(apply: (config: PersistedConfig) => PersistedConfig): Promise<PersistedConfig> {
    const run = this.pending.then(async () => {
      const next = apply(await this.load());
      await this.save(next);
      return next;
    });
    this.pending = run.catch(() => undefined);
    return run;
  }

  async addRecentTemplate(entry: string): Promise<string[]> {
    const next = await this.update((config) => ({
      ...config,
      recent_templates: addRecent(config.recent_templates, entry),
    }));
    return next.recent_templates ?? [];
  }

  async addRecentOwner(owner: string): Promise<string[]> {
    const next = await this.update((config) => ({
      ...config,
      recent_owners: addRecent(config.recent_owners, owner),
    }));
    return next.recent_owners ?? [];
  }
}
