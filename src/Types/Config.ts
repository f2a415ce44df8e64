import type { LinePolicy } from '../Domain/index.js';
import type { LogLevelName } from '../Common/Log.js';

/**
 * Validated configuration shape used across services.
 */
export interface ValidatedConfig {
    dictionaryPath: string; // absolute path of the typo dictionary
    ignoreWordsFile?: string; // optional list of words never reported
    fileExtensions: string[]; // extensions scanned inside directories; empty = all
    plaintext: boolean; // read files as plain text instead of source code
    withContext: boolean; // print the offending source line under each finding
    linePolicy: LinePolicy;
    logLevel: LogLevelName;
}

