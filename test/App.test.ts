import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import * as path from 'path';
import { ParseCliArguments, ParseExtensions, TypoScanApp } from '../src/App.js';
import { MainEventBus } from '../src/Events/MainEventBus.js';
import { GetLogLevel, LogLevel } from '../src/Common/Log.js';

describe('ParseExtensions', () => {
    it('should trim entries and drop leading dots', () => {
        expect(ParseExtensions('php, .html')).toEqual(['php', 'html']);
        expect(ParseExtensions('')).toEqual([]);
    });
});

describe('ParseCliArguments', () => {
    it('should map flags to config overrides', () => {
        expect(ParseCliArguments(['-pc', '--extensions=php,inc', '--line-policy', 'physical', 'src', 'index.php'])).toEqual({
            help: false,
            paths: ['src', 'index.php'],
            configPath: undefined,
            overrides: {
                plaintext: true,
                withContext: true,
                fileExtensions: ['php', 'inc'],
                dictionaryPath: undefined,
                ignoreWordsFile: undefined,
                linePolicy: 'physical',
                logLevel: undefined,
            },
        });
    });

    it('should accept help as a positional argument', () => {
        const cli = ParseCliArguments(['help', 'src']);
        expect(cli.help).toBe(true);
        expect(cli.paths).toEqual(['src']);
    });

    it('should throw on unknown options', () => {
        expect(() => ParseCliArguments(['--bogus'])).toThrow();
    });
});

describe('TypoScanApp', () => {
    let dir: string;
    let dictionaryPath: string;
    let output: string[];
    let app: TypoScanApp;

    beforeEach(async () => {
        dir = await mkdtemp(path.join(tmpdir(), 'typo-scan-app-'));
        dictionaryPath = path.join(dir, 'dict.txt');
        await writeFile(dictionaryPath, 'teh->the\n');
        output = [];
        app = new TypoScanApp(new MainEventBus(), line => {
            output.push(line);
        });
        vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    it('should print usage and succeed for --help', async () => {
        expect(await app.Run(['--help'], {})).toBe(0);
        expect(output).toEqual([]);
    });

    it('should fail without paths', async () => {
        expect(await app.Run([], {})).toBe(1);
    });

    it('should fail on unknown options', async () => {
        expect(await app.Run(['--bogus', dir], {})).toBe(1);
    });

    it('should exit with the number of findings', async () => {
        const file = path.join(dir, 'a.php');
        await writeFile(file, '<?php // teh teh\n');
        expect(await app.Run([`--dictionary=${dictionaryPath}`, file], {})).toBe(2);
        expect(output).toEqual([
            `${file}:1: Saw a possible typo "teh" in a comment (Did you mean "the"?)`,
            `${file}:1: Saw a possible typo "teh" in a comment (Did you mean "the"?)`,
        ]);
    });

    it('should apply the configured log level', async () => {
        const file = path.join(dir, 'clean.php');
        await writeFile(file, '<?php // fine\n');
        expect(await app.Run(['--log-level=error', file], { TYPO_SCAN_DICTIONARY: dictionaryPath })).toBe(0);
        expect(GetLogLevel()).toBe(LogLevel.Error);
    });

    it('should cap the exit status at 255', async () => {
        const file = path.join(dir, 'many.txt');
        await writeFile(file, 'teh '.repeat(300));
        expect(await app.Run(['--plaintext', `--dictionary=${dictionaryPath}`, file], {})).toBe(255);
        expect(output).toHaveLength(300);
    });

    it('should print each finding once when apps share an event bus', async () => {
        const bus = new MainEventBus();
        const first: string[] = [];
        const second: string[] = [];
        const firstApp = new TypoScanApp(bus, line => {
            first.push(line);
        });
        const secondApp = new TypoScanApp(bus, line => {
            second.push(line);
        });
        const file = path.join(dir, 'a.php');
        await writeFile(file, '<?php // teh\n');

        expect(await firstApp.Run([`--dictionary=${dictionaryPath}`, file], {})).toBe(1);
        expect(await secondApp.Run([`--dictionary=${dictionaryPath}`, file], {})).toBe(1);
        expect(first).toEqual([`${file}:1: Saw a possible typo "teh" in a comment (Did you mean "the"?)`]);
        expect(second).toEqual(first);
        expect(bus.listenerCount('output')).toBe(0);
    });

    it('should fail when the dictionary cannot be loaded', async () => {
        const file = path.join(dir, 'a.php');
        await writeFile(file, '<?php // teh\n');
        expect(await app.Run([`--dictionary=${path.join(dir, 'missing.txt')}`, file], {})).toBe(1);
        expect(output).toEqual([]);
    });

    it('should read the config file named in the environment', async () => {
        const configPath = path.join(dir, 'typo-scan.json');
        await writeFile(configPath, JSON.stringify({ dictionaryPath, plaintext: true }));
        const file = path.join(dir, 'a.php');
        await writeFile(file, '<?php\n// teh\n');
        expect(await app.Run([file], { TYPO_SCAN_CONFIG: configPath })).toBe(1);
        expect(output).toEqual([`${file}:2: Saw a possible typo "teh" in plain text (Did you mean "the"?)`]);
    });
});
