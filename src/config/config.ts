import dotenv from 'dotenv';
import { envSchema, Env } from './env.schema';
import logger from '../utils/logger';

// 環境変数を読み込み
dotenv.config();

export class ConfigStore {
  private static instance: ConfigStore;
  private config: Env;

  private constructor() {
    try {
      this.config = envSchema.parse(process.env);
      logger.debug('Environment loaded successfully');
    } catch (error) {
      logger.error('Environment validation failed', { error });
      throw error;
    }
  }

  static getInstance(): ConfigStore {
    if (!ConfigStore.instance) {
      ConfigStore.instance = new ConfigStore();
    }
    return ConfigStore.instance;
  }

  get projectConfigPath(): string {
    return this.config.WORKSHEET_CONFIG;
  }

  get mergeOutputDir(): string {
    return this.config.MERGE_OUTPUT_DIR;
  }

  get strictSequence(): boolean {
    return this.config.STRICT_SEQUENCE;
  }

  get logLevel(): string {
    return this.config.LOG_LEVEL;
  }

  get nodeEnv(): string {
    return this.config.NODE_ENV;
  }
}

export default ConfigStore.getInstance();
