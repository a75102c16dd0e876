import * as fs from 'fs';
import * as path from 'path';
import { IOError, describeError } from '../errors';
import { SaveDocument } from '../save/save-data';
import { StagingFormat, formatStagingText, parseStagingText } from '../save/save-codec';
import { Logger } from '../utils/logger';

/**
 * Local files kept around a session: the readable staging checkpoint for each
 * slot and the timestamped backups of every save pushed to the device.
 */

function pad(value: number, width: number = 2): string {
    return String(value).padStart(width, '0');
}

/**
 * Backup filename for a slot, stamped with local time to the second
 */
export function backupFilename(slot: number, date: Date): string {
    const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
    const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
    return `slot${slot}-${day}-${time}.dat`;
}

export class StagingStore {
    constructor(
        private readonly stagingDir: string,
        private readonly backupDir: string,
        private readonly format: StagingFormat,
        private readonly logger: Logger
    ) {}

    stagingPath(slot: number): string {
        return path.join(this.stagingDir, `slot${slot}.${this.format}`);
    }

    exists(slot: number): boolean {
        return fs.existsSync(this.stagingPath(slot));
    }

    read(slot: number): SaveDocument {
        const file = this.stagingPath(slot);
        let text: string;
        try {
            text = fs.readFileSync(file, 'utf8');
        } catch (error) {
            throw new IOError(`Failed to read staging file: ${describeError(error)}`, file, { cause: error });
        }
        this.logger.debug('Read staging file', { file, bytes: text.length });
        return parseStagingText(text, this.format);
    }

    write(slot: number, doc: SaveDocument): string {
        const file = this.stagingPath(slot);
        try {
            fs.mkdirSync(this.stagingDir, { recursive: true });
            fs.writeFileSync(file, formatStagingText(doc, this.format), 'utf8');
        } catch (error) {
            throw new IOError(`Failed to write staging file: ${describeError(error)}`, file, { cause: error });
        }
        this.logger.debug('Wrote staging file', { file });
        return file;
    }

    remove(slot: number): void {
        const file = this.stagingPath(slot);
        try {
            fs.rmSync(file, { force: true });
        } catch (error) {
            throw new IOError(`Failed to remove staging file: ${describeError(error)}`, file, { cause: error });
        }
        this.logger.debug('Removed staging file', { file });
    }

    writeBackup(slot: number, bytes: Buffer, date: Date): string {
        const file = path.join(this.backupDir, backupFilename(slot, date));
        try {
            fs.mkdirSync(this.backupDir, { recursive: true });
            fs.writeFileSync(file, bytes);
        } catch (error) {
            throw new IOError(`Failed to write backup: ${describeError(error)}`, file, { cause: error });
        }
        this.logger.info('Saved backup', { file, bytes: bytes.length });
        return file;
    }
}
