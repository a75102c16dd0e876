import { SaveItem } from './save-data';

/**
 * Item class identifiers and thresholds used by the mutation rules.
 */

const PACKAGE = 'com.shatteredpixel.shatteredpixeldungeon';

export const MAX_DURABILITY = 100;
export const STACK_FLOOR = 10;

export const MAGIC_MAPPING_CLASS = `${PACKAGE}.items.scrolls.ScrollOfMagicMapping`;

// Stackable consumables whose quantity gets raised to STACK_FLOOR
export const MULTIPLIABLE_PREFIXES: readonly string[] = [
    `${PACKAGE}.items.food.`,
    `${PACKAGE}.items.potions.`,
    `${PACKAGE}.plants.`,
    `${PACKAGE}.items.scrolls.`,
    `${PACKAGE}.items.stones.`,
    `${PACKAGE}.items.Ankh`,
    `${PACKAGE}.items.Honeypot`
];

/**
 * Items guaranteed to be in the hero's inventory after a run.
 */
export const ESSENTIAL_ITEMS: readonly Readonly<SaveItem>[] = [
    {
        __className: MAGIC_MAPPING_CLASS,
        quantity: STACK_FLOOR,
        cursed: false,
        level: 0,
        levelKnown: false,
        cursedKnown: false
    }
];

export function isMultipliable(className: string): boolean {
    return MULTIPLIABLE_PREFIXES.some(prefix => className.startsWith(prefix));
}
