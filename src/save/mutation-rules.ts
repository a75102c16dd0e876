import { SaveDocument, ensureHeroInventory, numericField } from './save-data';
import { InventoryWalker, walkInventory } from './inventory-walker';
import { ESSENTIAL_ITEMS, MAX_DURABILITY, STACK_FLOOR, isMultipliable } from './item-catalog';

/**
 * Fixed edits applied to a decoded save. Each rule mutates the document in
 * place, returns how many fields or items it changed, and changes nothing when
 * run a second time.
 */

export type RuleName = 'heal' | 'bless' | 'ensure-essentials' | 'multiply';

export interface RuleOptions {
    /** Also lift curses while repairing. Off unless explicitly enabled. */
    removeCurses: boolean;
}

export type MutationRule = (doc: SaveDocument, walk: InventoryWalker, options: RuleOptions) => number;

export interface RuleResult {
    rule: RuleName;
    changes: number;
}

export const DEFAULT_RULE_OPTIONS: RuleOptions = { removeCurses: false };

export const heal: MutationRule = (doc) => {
    const hp = numericField(doc.hero, 'HP');
    const ht = numericField(doc.hero, 'HT');
    if (hp === undefined || ht === undefined || hp >= ht) {
        return 0;
    }
    doc.hero.HP = ht;
    return 1;
};

export const bless: MutationRule = (doc, walk, options) => {
    let changes = 0;
    for (const item of walk(doc.hero)) {
        const durability = numericField(item, 'durability');
        if (durability !== undefined && durability < MAX_DURABILITY) {
            item.durability = MAX_DURABILITY;
            changes++;
        }
        if (options.removeCurses && item.cursed === true) {
            item.cursed = false;
            changes++;
        }
    }
    return changes;
};

export const ensureEssentials: MutationRule = (doc, walk) => {
    const owned = new Set<string>();
    for (const item of walk(doc.hero)) {
        owned.add(item.__className);
    }

    let changes = 0;
    for (const template of ESSENTIAL_ITEMS) {
        if (owned.has(template.__className)) {
            continue;
        }
        ensureHeroInventory(doc.hero).push(structuredClone(template));
        owned.add(template.__className);
        changes++;
    }
    return changes;
};

export const multiply: MutationRule = (doc, walk) => {
    let changes = 0;
    for (const item of walk(doc.hero)) {
        if (!isMultipliable(item.__className)) {
            continue;
        }
        const quantity = numericField(item, 'quantity');
        if (quantity !== undefined && quantity < STACK_FLOOR) {
            item.quantity = STACK_FLOOR;
            changes++;
        }
    }
    return changes;
};

// Order is fixed so logs come out the same on every run
export const MUTATION_RULES: ReadonlyArray<{ name: RuleName; apply: MutationRule }> = [
    { name: 'heal', apply: heal },
    { name: 'bless', apply: bless },
    { name: 'ensure-essentials', apply: ensureEssentials },
    { name: 'multiply', apply: multiply }
];

export function applyMutationRules(
    doc: SaveDocument,
    options: RuleOptions = DEFAULT_RULE_OPTIONS,
    walk: InventoryWalker = walkInventory
): RuleResult[] {
    return MUTATION_RULES.map(({ name, apply }) => ({ rule: name, changes: apply(doc, walk, options) }));
}
