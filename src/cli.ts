/**
 * Tabular Insight - Command Line
 *
 * @example
 * tabular-insight data.json
 * tabular-insight data.json --viz 3d_surface --output report.json --verbose
 */

import { readFileSync, writeFileSync } from 'node:fs';
import { parseArgs } from 'node:util';
import { generate, isBatchResult } from './index.js';
import type { GenerateResult } from './index.js';
import { exportReport, serializeReport } from './export.js';
import { formatProfile, formatReport } from './format.js';
import { isVisualizationType, VISUALIZATION_TYPES } from './recommend.js';
import type { ReportJson } from './validation.js';

export interface CliIO {
    stdout(text: string): void;
    stderr(text: string): void;
}

const consoleIO: CliIO = {
    stdout: (text) => console.log(text),
    stderr: (text) => console.error(text),
};

const USAGE = `Usage: tabular-insight <input.json> [options]

Options:
  --viz <type>       Preferred visualization (${VISUALIZATION_TYPES.join(', ')})
  -o, --output <file> Write the exported report as JSON
  -v, --verbose      Log progress
  -h, --help         Show this help`;

function readJson(path: string): unknown {
    const raw = readFileSync(path, 'utf8');
    try {
        return JSON.parse(raw);
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new Error(`${path} is not valid JSON: ${reason}`);
    }
}

function printResult(result: GenerateResult, io: CliIO): void {
    if (result.metadata) {
        io.stdout(`Metadata: ${JSON.stringify(result.metadata)}`);
    }

    if (!isBatchResult(result)) {
        io.stdout(formatProfile(result.decision.profile));
        io.stdout(formatReport(result.report));
        return;
    }

    for (const [name, entry] of Object.entries(result.results)) {
        io.stdout(`\n## ${name}`);
        if (entry.ok) {
            io.stdout(formatProfile(entry.decision.profile));
            io.stdout(formatReport(entry.report));
        } else {
            io.stdout(`Failed: ${entry.error.message}`);
        }
    }
}

/** Exported report text; a batch becomes one object keyed by table name */
function outputText(result: GenerateResult): string {
    if (!isBatchResult(result)) {
        return serializeReport(result.report);
    }

    const reports: Record<string, ReportJson> = {};
    for (const [name, entry] of Object.entries(result.results)) {
        if (entry.ok) reports[name] = exportReport(entry.report);
    }
    return JSON.stringify(reports, null, 2);
}

/**
 * Run the command line with the given arguments (without node and script path).
 * Returns the process exit code.
 */
export function runCli(argv: readonly string[], io: CliIO = consoleIO): number {
    try {
        const { values, positionals } = parseArgs({
            args: [...argv],
            allowPositionals: true,
            options: {
                viz: { type: 'string' },
                output: { type: 'string', short: 'o' },
                verbose: { type: 'boolean', short: 'v' },
                help: { type: 'boolean', short: 'h' },
            },
        });

        if (values.help) {
            io.stdout(USAGE);
            return 0;
        }

        const [inputPath] = positionals;
        if (inputPath === undefined) {
            io.stderr(`Error: missing input file\n\n${USAGE}`);
            return 1;
        }

        const preference = values.viz;
        if (preference !== undefined && !isVisualizationType(preference)) {
            io.stderr(`Error: unknown visualization type "${preference}"`);
            return 1;
        }

        const result = generate(readJson(inputPath), {
            preference,
            verbose: values.verbose ?? false,
        });

        printResult(result, io);

        if (values.output !== undefined) {
            writeFileSync(values.output, `${outputText(result)}\n`, 'utf8');
            io.stdout(`Report exported to: ${values.output}`);
        }

        return 0;
    } catch (error) {
        io.stderr(`Error: ${error instanceof Error ? error.message : String(error)}`);
        return 1;
    }
}
