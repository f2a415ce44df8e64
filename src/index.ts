#!/usr/bin/env node
/**
 * Main entry point for the typo-scan command line tool.
 */

import { TypoScanApp } from './App.js';

async function main() {
    try {
        const app = new TypoScanApp();
        process.exitCode = await app.Run(process.argv.slice(2));
    } catch(err) {
        console.error(`Fatal error during scan:`, err);
        process.exit(1);
    }
}

void main();
