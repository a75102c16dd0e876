import { Hero, SaveItem, isSaveItem } from './save-data';

/**
 * Inventory traversal over the hero's owned items
 */

export type InventoryWalker = (hero: Hero) => Iterable<SaveItem>;

/**
 * Walk a container's contents depth first. A nested container yields its own
 * contents before itself.
 */
function* walkContents(contents: unknown): Generator<SaveItem> {
    if (!Array.isArray(contents)) {
        return;
    }

    for (const entry of contents) {
        if (!isSaveItem(entry)) {
            continue;
        }
        yield* walkContents(entry.inventory);
        yield entry;
    }
}

/**
 * Yield every item the hero owns: equipped weapon, equipped armor, then the
 * inventory with bags expanded. Items are live references into the document.
 */
export function* walkInventory(hero: Hero): Generator<SaveItem> {
    if (isSaveItem(hero.weapon)) {
        yield hero.weapon;
    }
    if (isSaveItem(hero.armor)) {
        yield hero.armor;
    }
    yield* walkContents(hero.inventory);
}
