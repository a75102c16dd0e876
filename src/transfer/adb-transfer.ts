/**
 * Save transfer over the Android debug bridge
 */
import { spawnSync } from 'child_process';
import * as fs from 'fs';
import * as path from 'path';
import { TransferConfig } from '../config/app-config';
import { IOError, TransferError, describeError } from '../errors';
import { Logger } from '../utils/logger';
import { SaveTransfer } from './save-transfer';

export interface ToolResult {
  status: number | null;
  stdout: Buffer;
  stderr: Buffer;
  error?: Error;
}

export type ProcessRunner = (command: string, args: string[]) => ToolResult;

// Save files are small, but leave room for a late-game hero with full bags
const MAX_OUTPUT_BYTES = 64 * 1024 * 1024;

export const spawnRunner: ProcessRunner = (command, args) => {
  const result = spawnSync(command, args, { maxBuffer: MAX_OUTPUT_BYTES });
  return {
    status: result.status,
    stdout: result.stdout ?? Buffer.alloc(0),
    stderr: result.stderr ?? Buffer.alloc(0),
    error: result.error
  };
};

export function remoteSavePath(template: string, slot: number): string {
  return template.split('{slot}').join(String(slot));
}

export class AdbTransfer implements SaveTransfer {
  constructor(
    private readonly config: TransferConfig,
    private readonly logger: Logger,
    private readonly runner: ProcessRunner = spawnRunner
  ) {}

  fetch(slot: number, localPath: string): void {
    const remote = remoteSavePath(this.config.remotePathTemplate, slot);
    this.logger.info('Fetching save from device', { slot, remote });

    const result = this.adb(['exec-out', 'run-as', this.config.packageName, 'cat', remote]);

    try {
      fs.writeFileSync(localPath, result.stdout);
    } catch (error) {
      throw new IOError(`Failed to write fetched save: ${describeError(error)}`, localPath, { cause: error });
    }
    this.logger.debug('Fetched save', { slot, bytes: result.stdout.length, localPath });
  }

  push(slot: number, localPath: string): void {
    const remote = remoteSavePath(this.config.remotePathTemplate, slot);
    const deviceTemp = path.posix.join(this.config.remoteTempDir, path.basename(localPath));
    this.logger.info('Pushing save to device', { slot, remote });

    // The app's private directory is only writable through run-as, so stage in a world-readable spot first
    try {
      this.adb(['push', localPath, deviceTemp]);
      this.adb(['shell', 'run-as', this.config.packageName, 'cp', deviceTemp, remote]);
    } finally {
      this.removeDeviceTemp(deviceTemp);
    }
  }

  private removeDeviceTemp(deviceTemp: string): void {
    try {
      this.adb(['shell', 'rm', '-f', deviceTemp]);
    } catch (error) {
      this.logger.warn('Could not remove temporary save from device', { deviceTemp, error: describeError(error) });
    }
  }

  private adb(args: string[]): ToolResult {
    const fullArgs = this.config.deviceSerial
      ? ['-s', this.config.deviceSerial, ...args]
      : args;
    const commandLine = [this.config.adbPath, ...fullArgs].join(' ');
    this.logger.debug('Running device bridge', { command: commandLine });

    const result = this.runner(this.config.adbPath, fullArgs);

    if (result.error) {
      throw new TransferError(
        `Could not run ${this.config.adbPath}: ${result.error.message}`,
        commandLine,
        null,
        '',
        { cause: result.error }
      );
    }

    if (result.status !== 0) {
      const stderr = result.stderr.toString('utf8').trim();
      throw new TransferError(
        `${commandLine} exited with status ${result.status}${stderr ? `: ${stderr}` : ''}`,
        commandLine,
        result.status,
        stderr
      );
    }

    return result;
  }
}
