import fs from 'node:fs/promises';
import path from 'node:path';
import type { PersistedConfiguration } from './protocol.js';

export interface ConfigurationStore {
  load(): Promise<PersistedConfiguration | null>;
  save(configuration: PersistedConfiguration): Promise<void>;
}

function isPersistedConfiguration(value: unknown): value is PersistedConfiguration {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const source = 'currentSource' in value ? value.currentSource : undefined;
  return (
    (source === null || typeof source === 'string') &&
    'locked' in value &&
    typeof value.locked === 'boolean' &&
    'pattern' in value &&
    typeof value.pattern === 'string' &&
    'savedAt' in value &&
    typeof value.savedAt === 'string'
  );
}

/** Small JSON document replaced atomically through a temp file and rename. */
export class JsonFileConfigurationStore implements ConfigurationStore {
  private readonly filePath: string;
  private writes = 0;

  constructor(filePath: string) {
    this.filePath = path.resolve(filePath);
  }

  getPath() {
    return this.filePath;
  }

  async load(): Promise<PersistedConfiguration | null> {
    let contents: string;
    try {
      contents = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return null;
      }
      throw error;
    }

    const parsed: unknown = JSON.parse(contents);
    if (!isPersistedConfiguration(parsed)) {
      throw new Error(`Saved configuration at ${this.filePath} is malformed`);
    }
    return parsed;
  }

  async save(configuration: PersistedConfiguration): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    this.writes += 1;
    const tempPath = `${this.filePath}.${process.pid}.${this.writes}.tmp`;
    try {
      await fs.writeFile(tempPath, `${JSON.stringify(configuration, null, 2)}\n`, 'utf-8');
      await fs.rename(tempPath, this.filePath);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw error;
    }
  }
}
