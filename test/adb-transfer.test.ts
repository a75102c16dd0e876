import assert from 'node:assert/strict';
import { afterEach, beforeEach, describe, it } from 'node:test';
import * as fs from 'fs';
import * as path from 'path';
import { TransferConfig } from '../src/config/app-config';
import { TransferError } from '../src/errors';
import { AdbTransfer, ProcessRunner, ToolResult, remoteSavePath } from '../src/transfer/adb-transfer';
import { makeTempDir, removeDir, silentLogger } from './helpers/fixtures';

interface Call {
    command: string;
    args: string[];
}

function ok(stdout: Buffer = Buffer.alloc(0)): ToolResult {
    return { status: 0, stdout, stderr: Buffer.alloc(0) };
}

function recordingRunner(results: ToolResult[]): { calls: Call[]; runner: ProcessRunner } {
    const calls: Call[] = [];
    const runner: ProcessRunner = (command, args) => {
        calls.push({ command, args });
        return results.shift() ?? ok();
    };
    return { calls, runner };
}

const baseConfig: TransferConfig = {
    adbPath: '/opt/android/adb',
    packageName: 'com.example.dungeon',
    remotePathTemplate: 'files/game{slot}/game.dat',
    remoteTempDir: '/data/local/tmp'
};

describe('AdbTransfer', () => {
    let dir: string;

    beforeEach(() => {
        dir = makeTempDir();
    });

    afterEach(() => {
        removeDir(dir);
    });

    it('substitutes the slot into the remote path template', () => {
        assert.equal(remoteSavePath('files/game{slot}/game.dat', 3), 'files/game3/game.dat');
        assert.equal(remoteSavePath('saves/{slot}/{slot}.dat', 2), 'saves/2/2.dat');
    });

    it('fetches through run-as and writes stdout to the local file', () => {
        const { calls, runner } = recordingRunner([ok(Buffer.from([0x1f, 0x8b, 0x08]))]);
        const local = path.join(dir, 'game2.dat');

        new AdbTransfer(baseConfig, silentLogger(), runner).fetch(2, local);

        assert.deepStrictEqual(calls, [
            {
                command: '/opt/android/adb',
                args: ['exec-out', 'run-as', 'com.example.dungeon', 'cat', 'files/game2/game.dat']
            }
        ]);
        assert.deepStrictEqual(fs.readFileSync(local), Buffer.from([0x1f, 0x8b, 0x08]));
    });

    it('pushes through a device temp file and copies it into place', () => {
        const { calls, runner } = recordingRunner([]);

        new AdbTransfer(baseConfig, silentLogger(), runner).push(1, '/work/scratch/game1.dat');

        assert.deepStrictEqual(calls.map(c => c.args), [
            ['push', '/work/scratch/game1.dat', '/data/local/tmp/game1.dat'],
            ['shell', 'run-as', 'com.example.dungeon', 'cp', '/data/local/tmp/game1.dat', 'files/game1/game.dat'],
            ['shell', 'rm', '-f', '/data/local/tmp/game1.dat']
        ]);
    });

    it('targets a specific device when a serial is configured', () => {
        const { calls, runner } = recordingRunner([]);
        const config: TransferConfig = { ...baseConfig, deviceSerial: 'emulator-5554' };

        new AdbTransfer(config, silentLogger(), runner).fetch(1, path.join(dir, 'game1.dat'));

        assert.deepStrictEqual(calls[0].args.slice(0, 3), ['-s', 'emulator-5554', 'exec-out']);
    });

    it('raises TransferError with the tool status and diagnostic on failure', () => {
        const { runner } = recordingRunner([
            { status: 1, stdout: Buffer.alloc(0), stderr: Buffer.from('run-as: package not debuggable\n') }
        ]);
        const transfer = new AdbTransfer(baseConfig, silentLogger(), runner);

        assert.throws(
            () => transfer.fetch(1, path.join(dir, 'game1.dat')),
            (error: unknown) => error instanceof TransferError
                && error.status === 1
                && error.exitCode === 1
                && error.stderr === 'run-as: package not debuggable'
                && error.message === '/opt/android/adb exec-out run-as com.example.dungeon cat files/game1/game.dat exited with status 1: run-as: package not debuggable'
        );
        assert.equal(fs.existsSync(path.join(dir, 'game1.dat')), false);
    });

    it('skips the copy when the upload fails but still clears the device temp file', () => {
        const { calls, runner } = recordingRunner([
            { status: 1, stdout: Buffer.alloc(0), stderr: Buffer.from('error: no devices/emulators found') }
        ]);

        assert.throws(() => new AdbTransfer(baseConfig, silentLogger(), runner).push(1, '/tmp/game1.dat'), TransferError);
        assert.deepStrictEqual(calls.map(c => c.args), [
            ['push', '/tmp/game1.dat', '/data/local/tmp/game1.dat'],
            ['shell', 'rm', '-f', '/data/local/tmp/game1.dat']
        ]);
    });

    it('clears the device temp file when the copy into place fails', () => {
        const { calls, runner } = recordingRunner([
            ok(),
            { status: 1, stdout: Buffer.alloc(0), stderr: Buffer.from('run-as: package not debuggable') }
        ]);

        assert.throws(
            () => new AdbTransfer(baseConfig, silentLogger(), runner).push(1, '/tmp/game1.dat'),
            (error: unknown) => error instanceof TransferError && error.stderr === 'run-as: package not debuggable'
        );
        assert.deepStrictEqual(calls[calls.length - 1].args, ['shell', 'rm', '-f', '/data/local/tmp/game1.dat']);
        assert.equal(calls.length, 3);
    });

    it('reports the copy failure even when the temp file cannot be removed', () => {
        const { runner } = recordingRunner([
            ok(),
            { status: 1, stdout: Buffer.alloc(0), stderr: Buffer.from('cp: Permission denied') },
            { status: 1, stdout: Buffer.alloc(0), stderr: Buffer.from('rm: Read-only file system') }
        ]);

        assert.throws(
            () => new AdbTransfer(baseConfig, silentLogger(), runner).push(1, '/tmp/game1.dat'),
            (error: unknown) => error instanceof TransferError && error.stderr === 'cp: Permission denied'
        );
    });

    it('reports a missing adb binary as an unavailable transfer', () => {
        const runner: ProcessRunner = () => ({
            status: null,
            stdout: Buffer.alloc(0),
            stderr: Buffer.alloc(0),
            error: new Error('spawnSync /opt/android/adb ENOENT')
        });

        assert.throws(
            () => new AdbTransfer(baseConfig, silentLogger(), runner).fetch(1, path.join(dir, 'game1.dat')),
            (error: unknown) => error instanceof TransferError
                && error.status === null
                && error.exitCode === 69
                && error.message === 'Could not run /opt/android/adb: spawnSync /opt/android/adb ENOENT'
        );
    });
});
