/**
 * Configuration management for the save editor
 */
import * as path from 'path';
import { StagingFormat, isStagingFormat } from '../save/save-codec';
import { LogFormat, Verbosity, isVerbosity } from '../utils/logger';

export interface TransferConfig {
  adbPath: string;
  deviceSerial?: string;
  packageName: string;
  remotePathTemplate: string;
  remoteTempDir: string;
}

export interface SessionConfig {
  slot: number;
  noSave: boolean;
  removeCurses: boolean;
  workDir?: string;
  backupDir: string;
  stagingFormat: StagingFormat;
}

export interface AppConfig {
  transfer: TransferConfig;
  session: SessionConfig;
  logging: {
    verbosity: Verbosity;
    format: LogFormat;
  };
}

/**
 * Values given on the command line; each one wins over the environment.
 */
export interface ConfigOverrides {
  slot?: number;
  noSave?: boolean;
  removeCurses?: boolean;
  workDir?: string;
  stagingFormat?: StagingFormat;
  verbosity?: Verbosity;
}

export type Environment = Record<string, string | undefined>;

export const DEFAULT_PACKAGE = 'com.shatteredpixel.shatteredpixeldungeon';
export const DEFAULT_REMOTE_PATH = 'files/game{slot}/game.dat';

export class ConfigManager {
  private readonly config: AppConfig;

  constructor(
    private readonly env: Environment = process.env,
    private readonly overrides: ConfigOverrides = {},
    private readonly cwd: string = process.cwd()
  ) {
    this.config = this.loadConfig();
  }

  private loadConfig(): AppConfig {
    const env = this.env;
    const overrides = this.overrides;

    return {
      transfer: {
        adbPath: env.ADB_PATH || 'adb',
        deviceSerial: env.ANDROID_SERIAL || undefined,
        packageName: env.SAVE_EDITOR_PACKAGE || DEFAULT_PACKAGE,
        remotePathTemplate: env.SAVE_EDITOR_REMOTE_PATH || DEFAULT_REMOTE_PATH,
        remoteTempDir: env.SAVE_EDITOR_REMOTE_TMP || '/data/local/tmp'
      },
      session: {
        slot: overrides.slot ?? 1,
        noSave: overrides.noSave ?? false,
        removeCurses: overrides.removeCurses ?? env.SAVE_EDITOR_REMOVE_CURSES === 'true',
        workDir: overrides.workDir,
        backupDir: path.resolve(this.cwd, env.SAVE_EDITOR_BACKUP_DIR || 'backups'),
        stagingFormat: overrides.stagingFormat ?? this.parseStagingFormat(env.SAVE_EDITOR_STAGING_FORMAT)
      },
      logging: {
        verbosity: overrides.verbosity ?? this.parseVerbosity(env.LOG_LEVEL),
        format: env.LOG_FORMAT === 'json' ? 'json' : 'pretty'
      }
    };
  }

  private parseStagingFormat(value: string | undefined): StagingFormat {
    return value && isStagingFormat(value) ? value : 'json';
  }

  private parseVerbosity(value: string | undefined): Verbosity {
    return value && isVerbosity(value) ? value : 'quiet';
  }

  get(): AppConfig {
    return this.config;
  }

  getTransfer(): TransferConfig {
    return this.config.transfer;
  }

  getSession(): SessionConfig {
    return this.config.session;
  }
}
