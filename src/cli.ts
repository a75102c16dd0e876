#!/usr/bin/env node
import { AppConfig, ConfigManager, Environment } from './config/app-config';
import { CliArgs, USAGE, parseCliArgs } from './cli-args';
import { describeError, exitCodeFor } from './errors';
import { SaveSession, SessionReport } from './session/save-session';
import { StagingStore } from './session/staging-store';
import { AdbTransfer } from './transfer/adb-transfer';
import { SaveTransfer } from './transfer/save-transfer';
import { LogSink, Logger, createLogger } from './utils/logger';
import { withWorkDir } from './utils/workdir';

export interface CliDependencies {
    sink?: LogSink;
    cwd?: string;
    createTransfer?: (config: AppConfig, logger: Logger) => SaveTransfer;
    print?: (text: string) => void;
}

/**
 * Run one editing session inside its working directory
 */
export function runEditor(config: AppConfig, logger: Logger, transfer: SaveTransfer): SessionReport {
    const session = config.session;

    return withWorkDir(session.workDir, logger, (layout) => {
        const staging = new StagingStore(
            layout.stagingDir,
            session.backupDir,
            session.stagingFormat,
            logger.child({ component: 'staging' })
        );

        return new SaveSession({
            slot: session.slot,
            noSave: session.noSave,
            rules: { removeCurses: session.removeCurses },
            scratchDir: layout.scratchDir,
            transfer,
            staging,
            logger
        }).run();
    });
}

function summarize(report: SessionReport, logger: Logger): void {
    const changes = report.results.map(r => `${r.rule}=${r.changes}`).join(' ');
    logger.info(`Slot ${report.slot} ${report.pushed ? 'written back' : 'not written back'}: ${changes}`, {
        state: report.state,
        resumed: report.resumed,
        backup: report.backupPath,
        staging: report.state === 'checkpointed' ? report.stagingPath : undefined
    });
}

/**
 * CLI entry point; returns the process exit code
 */
export function main(argv: string[], env: Environment = process.env, deps: CliDependencies = {}): number {
    const print = deps.print ?? ((text: string) => console.log(text));

    let args: CliArgs;
    try {
        args = parseCliArgs(argv);
    } catch (error) {
        print(`${describeError(error)}\n\n${USAGE}`);
        return exitCodeFor(error);
    }

    if (args.help) {
        print(USAGE);
        return 0;
    }

    const config = new ConfigManager(env, args.overrides, deps.cwd).get();
    const logger = createLogger('dungeon-save-editor', {
        verbosity: config.logging.verbosity,
        format: config.logging.format,
        sink: deps.sink
    });
    const createTransfer = deps.createTransfer
        ?? ((appConfig: AppConfig, log: Logger) => new AdbTransfer(appConfig.transfer, log.child({ component: 'adb' })));

    try {
        const report = runEditor(config, logger, createTransfer(config, logger));
        summarize(report, logger);
        return 0;
    } catch (error) {
        logger.error(describeError(error), { error: error instanceof Error ? error.name : 'Error' });
        return exitCodeFor(error);
    }
}

if (require.main === module) {
    process.exitCode = main(process.argv.slice(2));
}
