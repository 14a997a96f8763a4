import * as fs from 'node:fs';
import * as path from 'node:path';
import { parse as parseToml, stringify as tomlStringify } from '@iarna/toml';
import { FettersError } from '../errors.js';
import { resolveAppPaths } from '../paths.js';
import { DEFAULT_CONFIG, fettersConfigSchema } from './schema.js';
import type { FettersConfig } from './schema.js';

export interface ConfigStoreDeps {
  readFile: (path: string) => string;
  writeFile: (path: string, data: string) => void;
  existsSync: (path: string) => boolean;
  mkdirSync: (path: string, opts?: { recursive: boolean }) => void;
  configPath: string;
}

export interface ConfigStore {
  readonly path: string;
  exists(): boolean;
  load(): FettersConfig;
  save(config: FettersConfig): void;
  setCurrentSprint(name: string): void;
}

const fsDeps: Omit<ConfigStoreDeps, 'configPath'> = {
  readFile: (p: string) => fs.readFileSync(p, 'utf-8'),
  writeFile: (p: string, data: string) => fs.writeFileSync(p, data, 'utf-8'),
  existsSync: (p: string) => fs.existsSync(p),
  mkdirSync: (p: string, opts?: { recursive: boolean }) => {
    fs.mkdirSync(p, opts);
  },
};

export function createConfigStore(overrides: Partial<ConfigStoreDeps> = {}): ConfigStore {
  const deps: ConfigStoreDeps = {
    ...fsDeps,
    ...overrides,
    configPath: overrides.configPath ?? resolveAppPaths().configFile,
  };

  function exists(): boolean {
    return deps.existsSync(deps.configPath);
  }

  /**
   * Read config.toml. A missing file yields the defaults.
   */
  function load(): FettersConfig {
    if (!exists()) {
      return { ...DEFAULT_CONFIG };
    }

    let raw: string;
    try {
      raw = deps.readFile(deps.configPath);
    } catch (err) {
      throw FettersError.io(err);
    }

    let parsed: unknown;
    try {
      parsed = parseToml(raw);
    } catch (err) {
      throw FettersError.configDeserialize(err);
    }

    const result = fettersConfigSchema.safeParse(parsed);
    if (!result.success) {
      throw FettersError.configDeserialize(
        new Error(
          `Invalid config at ${deps.configPath}: ${result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join(', ')}`,
        ),
      );
    }
    return result.data;
  }

  function save(config: FettersConfig): void {
    const validated = fettersConfigSchema.parse(config);

    let content: string;
    try {
      content = tomlStringify({ current_sprint_name: validated.current_sprint_name });
    } catch (err) {
      throw FettersError.configSerialize(err);
    }

    try {
      deps.mkdirSync(path.dirname(deps.configPath), { recursive: true });
      deps.writeFile(deps.configPath, content);
    } catch (err) {
      throw FettersError.io(err);
    }
  }

  function setCurrentSprint(name: string): void {
    save({ ...load(), current_sprint_name: name });
  }

  return { path: deps.configPath, exists, load, save, setCurrentSprint };
}
