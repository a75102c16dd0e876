import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { TransferError } from '../../src/errors';
import { SaveDocument, SaveItem } from '../../src/save/save-data';
import { SaveTransfer } from '../../src/transfer/save-transfer';
import { LogLevel, LogSink, Logger } from '../../src/utils/logger';

const PKG = 'com.shatteredpixel.shatteredpixeldungeon';

export const CLASSES = {
    sword: `${PKG}.items.weapon.melee.Sword`,
    darts: `${PKG}.items.weapon.missiles.darts.Dart`,
    leather: `${PKG}.items.armor.LeatherArmor`,
    velvetPouch: `${PKG}.items.bags.VelvetPouch`,
    scrollHolder: `${PKG}.items.bags.ScrollHolder`,
    ration: `${PKG}.items.food.Food`,
    healing: `${PKG}.items.potions.PotionOfHealing`,
    sungrassSeed: `${PKG}.plants.Sungrass$Seed`,
    identify: `${PKG}.items.scrolls.ScrollOfIdentify`,
    magicMapping: `${PKG}.items.scrolls.ScrollOfMagicMapping`,
    blinkStone: `${PKG}.items.stones.StoneOfBlink`,
    ankh: `${PKG}.items.Ankh`,
    honeypot: `${PKG}.items.Honeypot`,
    gold: `${PKG}.items.Gold`,
    torch: `${PKG}.items.Torch`
};

export function item(className: string, fields: Record<string, unknown> = {}): SaveItem {
    return { ...fields, __className: className };
}

export function makeDocument(hero: Record<string, unknown> = {}): SaveDocument {
    return {
        version: 796,
        depth: 3,
        hero: {
            HP: 20,
            HT: 20,
            inventory: [],
            ...hero
        }
    };
}

export interface CapturedLine {
    level: LogLevel;
    line: string;
}

export class MemorySink implements LogSink {
    readonly lines: CapturedLine[] = [];

    write(level: LogLevel, line: string): void {
        this.lines.push({ level, line });
    }
}

export function silentLogger(): Logger {
    return new Logger({}, { verbosity: 'quiet', sink: new MemorySink() });
}

/**
 * In-process stand-in for the device: one byte buffer per slot.
 */
export class FakeTransfer implements SaveTransfer {
    readonly remote = new Map<number, Buffer>();
    fetchCount = 0;
    pushCount = 0;
    failPush = false;

    fetch(slot: number, localPath: string): void {
        this.fetchCount++;
        const bytes = this.remote.get(slot);
        if (!bytes) {
            throw new TransferError(`no save in slot ${slot}`, 'fake fetch', 1, 'remote object does not exist');
        }
        fs.writeFileSync(localPath, bytes);
    }

    push(slot: number, localPath: string): void {
        this.pushCount++;
        if (this.failPush) {
            throw new TransferError('device went away', 'fake push', 255, 'error: no devices/emulators found');
        }
        this.remote.set(slot, fs.readFileSync(localPath));
    }
}

export function makeTempDir(): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), 'save-editor-test-'));
}

export function removeDir(dir: string): void {
    fs.rmSync(dir, { recursive: true, force: true });
}
