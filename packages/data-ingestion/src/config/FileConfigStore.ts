import fs from 'fs/promises';
import path from 'path';
import type { StateConfig } from '@rollcall/types';
import { ConfigMissingError, InvalidConfigError } from '../errors';
import { getErrorMessage } from '../utils/errorUtils';
import defaultLogger, { Logger } from '../utils/logger';
import { parseStateConfig } from './stateConfigSchema';

function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

/**
 * StateConfig persistence as one JSON file per state: `<dir>/<state>_config.json`
 */
export class FileConfigStore {
  private readonly configDir: string;
  private readonly logger: Logger;

  constructor(configDir: string, logger?: Logger) {
    this.configDir = configDir;
    this.logger = logger ?? defaultLogger.child('config-store');
  }

  pathFor(stateCode: string): string {
    return path.join(this.configDir, `${stateCode.toLowerCase()}_config.json`);
  }

  async exists(stateCode: string): Promise<boolean> {
    try {
      await fs.access(this.pathFor(stateCode));
      return true;
    } catch (error) {
      if (isNotFound(error)) return false;
      throw error;
    }
  }

  async load(stateCode: string): Promise<StateConfig> {
    const filePath = this.pathFor(stateCode);

    let text: string;
    try {
      text = await fs.readFile(filePath, 'utf8');
    } catch (error) {
      if (isNotFound(error)) {
        throw new ConfigMissingError(stateCode.toUpperCase());
      }
      throw error;
    }

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (error) {
      throw new InvalidConfigError(filePath, [`not valid JSON: ${getErrorMessage(error)}`], { cause: error });
    }

    const parsed = parseStateConfig(data);
    if (!parsed.success) {
      throw new InvalidConfigError(filePath, parsed.issues);
    }
    if (parsed.config.state_code !== stateCode.toUpperCase()) {
      throw new InvalidConfigError(filePath, [
        `state_code ${parsed.config.state_code} does not match requested state ${stateCode.toUpperCase()}`
      ]);
    }

    this.logger.debug('Loaded state configuration', { state: parsed.config.state_code, version: parsed.config.version });
    return parsed.config;
  }

  /**
   * Load the config when present, undefined otherwise
   */
  async loadIfExists(stateCode: string): Promise<StateConfig | undefined> {
    try {
      return await this.load(stateCode);
    } catch (error) {
      if (error instanceof ConfigMissingError) return undefined;
      throw error;
    }
  }

  async save(config: StateConfig): Promise<string> {
    const filePath = this.pathFor(config.state_code);
    await fs.mkdir(this.configDir, { recursive: true });
    await fs.writeFile(filePath, `${JSON.stringify(config, null, 2)}\n`, 'utf8');

    this.logger.info('Saved state configuration', { state: config.state_code, version: config.version, path: filePath });
    return filePath;
  }
}

export default FileConfigStore;
