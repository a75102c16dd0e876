/**
 * Scoped working directory for one editing session
 */
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { IOError, describeError } from '../errors';
import { Logger } from './logger';

export interface WorkDirLayout {
  root: string;
  stagingDir: string;
  scratchDir: string;
  ephemeral: boolean;
}

function createLayout(override: string | undefined): WorkDirLayout {
  let root: string;
  let scratchDir: string;
  try {
    if (override) {
      root = path.resolve(override);
      fs.mkdirSync(root, { recursive: true });
    } else {
      root = fs.mkdtempSync(path.join(os.tmpdir(), 'dungeon-save-editor-'));
    }
    // Unique per run so an existing folder in a user-supplied directory is never touched
    scratchDir = fs.mkdtempSync(path.join(root, 'scratch-'));
  } catch (error) {
    throw new IOError(`Failed to create working directory: ${describeError(error)}`, override ?? os.tmpdir(), { cause: error });
  }

  return {
    root,
    stagingDir: path.join(root, 'staging'),
    scratchDir,
    ephemeral: !override
  };
}

function hasStagedFiles(stagingDir: string): boolean {
  return fs.existsSync(stagingDir) && fs.readdirSync(stagingDir).length > 0;
}

function releaseLayout(layout: WorkDirLayout, logger: Logger): void {
  try {
    fs.rmSync(layout.scratchDir, { recursive: true, force: true });

    if (!layout.ephemeral) {
      return;
    }

    if (hasStagedFiles(layout.stagingDir)) {
      logger.warn('Kept staging files; pass this directory to --workdir to resume', { workDir: layout.root });
      return;
    }

    fs.rmSync(layout.root, { recursive: true, force: true });
    logger.debug('Removed working directory', { workDir: layout.root });
  } catch (error) {
    logger.warn('Could not clean up working directory', { workDir: layout.root, error: describeError(error) });
  }
}

/**
 * Run `fn` inside a working directory. An explicit directory is created if
 * needed and left in place; otherwise a temp directory is used and removed on
 * every exit path, unless it still holds a staging file.
 */
export function withWorkDir<T>(override: string | undefined, logger: Logger, fn: (layout: WorkDirLayout) => T): T {
  const layout = createLayout(override);
  logger.debug('Using working directory', { workDir: layout.root, ephemeral: layout.ephemeral });
  try {
    return fn(layout);
  } finally {
    releaseLayout(layout, logger);
  }
}
