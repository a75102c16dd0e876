import { ERROR_MESSAGES, FormatError } from '../errors';

/**
 * Shape of the decoded save document.
 *
 * Only the fields the editor reads are named; everything else in the document
 * is carried through untouched. Field values come from an untrusted file, so
 * anything the rules act on is typed `unknown` and narrowed at the point of use.
 */

export type SaveRecord = Record<string, unknown>;

export interface SaveItem extends SaveRecord {
    __className: string;
    durability?: unknown;
    quantity?: unknown;
    cursed?: unknown;
    level?: unknown;
    inventory?: unknown;
}

export interface Hero extends SaveRecord {
    HP?: unknown;
    HT?: unknown;
    weapon?: unknown;
    armor?: unknown;
    inventory?: unknown;
}

export interface SaveDocument extends SaveRecord {
    hero: Hero;
}

export const CLASS_FIELD = '__className';

export function isRecord(value: unknown): value is SaveRecord {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isSaveItem(value: unknown): value is SaveItem {
    return isRecord(value) && typeof value[CLASS_FIELD] === 'string';
}

export function isSaveDocument(value: unknown): value is SaveDocument {
    return isRecord(value) && isRecord(value.hero);
}

/**
 * Numeric field value, or undefined when absent or not a finite number.
 */
export function numericField(record: SaveRecord, field: string): number | undefined {
    const value = record[field];
    return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

/**
 * The hero's top-level inventory, created when the save has none.
 */
export function ensureHeroInventory(hero: Hero): unknown[] {
    if (Array.isArray(hero.inventory)) {
        return hero.inventory;
    }
    if (hero.inventory !== undefined) {
        throw new FormatError(ERROR_MESSAGES.INVENTORY_NOT_LIST);
    }
    const inventory: unknown[] = [];
    hero.inventory = inventory;
    return inventory;
}
