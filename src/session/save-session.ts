import * as fs from 'fs';
import * as path from 'path';
import { ERROR_MESSAGES, IOError, describeError } from '../errors';
import { SaveDocument } from '../save/save-data';
import { decodeSave, encodeVerifiedSave } from '../save/save-codec';
import { RuleOptions, RuleResult, applyMutationRules } from '../save/mutation-rules';
import { InventoryWalker, walkInventory } from '../save/inventory-walker';
import { SaveTransfer } from '../transfer/save-transfer';
import { Logger } from '../utils/logger';
import { StagingStore } from './staging-store';

/**
 * One editing run over a single slot: load, mutate, store, clean up.
 */

export type SessionState = 'start' | 'loaded' | 'mutated' | 'stored' | 'cleaned' | 'checkpointed';

export interface SaveSessionOptions {
    slot: number;
    noSave: boolean;
    rules: RuleOptions;
    scratchDir: string;
    transfer: SaveTransfer;
    staging: StagingStore;
    logger: Logger;
    walk?: InventoryWalker;
    clock?: () => Date;
}

export interface SessionReport {
    slot: number;
    resumed: boolean;
    results: RuleResult[];
    pushed: boolean;
    backupPath?: string;
    stagingPath: string;
    state: SessionState;
}

export class SaveSession {
    private state: SessionState = 'start';
    private document: SaveDocument | null = null;
    private resumed = false;
    private results: RuleResult[] = [];
    private pushed = false;
    private backupPath?: string;
    private readonly logger: Logger;
    private readonly walk: InventoryWalker;
    private readonly clock: () => Date;

    constructor(private readonly options: SaveSessionOptions) {
        this.logger = options.logger.child({ component: 'session', slot: options.slot });
        this.walk = options.walk ?? walkInventory;
        this.clock = options.clock ?? (() => new Date());
    }

    get currentState(): SessionState {
        return this.state;
    }

    load(): SaveDocument {
        this.expectState('start', 'load');
        const { slot, staging } = this.options;

        let doc: SaveDocument;
        if (staging.exists(slot)) {
            this.logger.info('Resuming from staging file', { file: staging.stagingPath(slot) });
            doc = staging.read(slot);
            this.resumed = true;
        } else {
            doc = this.fetch();
        }

        // Checkpoint before touching anything so a failed run keeps the fetched save
        staging.write(slot, doc);
        this.document = doc;
        this.state = 'loaded';
        return doc;
    }

    mutate(): RuleResult[] {
        const doc = this.requireDocument('loaded', 'mutate');

        this.results = applyMutationRules(doc, this.options.rules, this.walk);
        for (const result of this.results) {
            this.logger.info(`Applied ${result.rule}`, { changes: result.changes });
        }
        this.state = 'mutated';
        return this.results;
    }

    store(): void {
        const doc = this.requireDocument('mutated', 'store');
        const { slot, staging, noSave } = this.options;

        staging.write(slot, doc);

        if (noSave) {
            this.logger.info('Saving suppressed; staging file left for inspection', { file: staging.stagingPath(slot) });
            this.state = 'stored';
            return;
        }

        const encoded = encodeVerifiedSave(doc);
        this.backupPath = staging.writeBackup(slot, encoded, this.clock());

        const uploadPath = path.join(this.options.scratchDir, `game${slot}.dat`);
        this.writeScratch(uploadPath, encoded);
        this.options.transfer.push(slot, uploadPath);
        this.pushed = true;
        this.state = 'stored';
    }

    cleanup(): SessionState {
        this.expectState('stored', 'cleanup');
        const { slot, staging } = this.options;

        if (this.pushed) {
            staging.remove(slot);
            this.state = 'cleaned';
        } else {
            this.state = 'checkpointed';
        }
        return this.state;
    }

    run(): SessionReport {
        this.load();
        this.mutate();
        this.store();
        this.cleanup();
        return this.report();
    }

    report(): SessionReport {
        return {
            slot: this.options.slot,
            resumed: this.resumed,
            results: this.results,
            pushed: this.pushed,
            backupPath: this.backupPath,
            stagingPath: this.options.staging.stagingPath(this.options.slot),
            state: this.state
        };
    }

    private fetch(): SaveDocument {
        const { slot, scratchDir, transfer } = this.options;
        const fetchedPath = path.join(scratchDir, `game${slot}.fetched.dat`);

        transfer.fetch(slot, fetchedPath);

        let bytes: Buffer;
        try {
            bytes = fs.readFileSync(fetchedPath);
        } catch (error) {
            throw new IOError(`Failed to read fetched save: ${describeError(error)}`, fetchedPath, { cause: error });
        }
        this.logger.debug('Decoding fetched save', { bytes: bytes.length });
        return decodeSave(bytes);
    }

    private writeScratch(file: string, bytes: Buffer): void {
        try {
            fs.writeFileSync(file, bytes);
        } catch (error) {
            throw new IOError(`Failed to write upload file: ${describeError(error)}`, file, { cause: error });
        }
    }

    private expectState(expected: SessionState, step: string): void {
        if (this.state !== expected) {
            throw new Error(`${ERROR_MESSAGES.SESSION_OUT_OF_ORDER}: ${step} needs state ${expected}, session is ${this.state}`);
        }
    }

    private requireDocument(expected: SessionState, step: string): SaveDocument {
        this.expectState(expected, step);
        if (!this.document) {
            throw new Error(`${ERROR_MESSAGES.SESSION_OUT_OF_ORDER}: ${step} has no document`);
        }
        return this.document;
    }
}
