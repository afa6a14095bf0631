#!/usr/bin/env node

import * as fs from 'node:fs';
import * as path from 'node:path';
import { globby } from 'globby';
import { detectDiagramType } from './core/router.js';
import { SUPPORTED_DIAGRAM_TYPES, type ValidationError } from './core/types.js';
import { toJsonResult, textReport } from './core/format.js';
import { offsetErrors } from './core/markdown.js';
import { isDiagramError } from './core/errors.js';
import { createLogger, type EngineLogger } from './core/logger.js';
import type { CliOptions } from './core/config.js';
import { diagramsIn, isGraphFile, parseCliArgs, readGraphJson, type ParsedArgs } from './core/cli-input.js';
import { CHARACTER_SET_NAMES } from './renderer/charset.js';
import { DiagramRenderer, renderGraph } from './renderer/index.js';

function printUsage() {
    console.log('Usage: gridchart render <file|dir|-> [options]');
    console.log('       gridchart validate <file|dir|->');
    console.log('       gridchart detect <file|->');
    console.log('       gridchart types [--json]');
    console.log('  - Accepts .mmd/.mermaid diagrams, Markdown with ```mermaid fences, or a .json graph model');
    console.log('  - When a directory is given, scans recursively for .md/.markdown/.mmd/.mermaid');
    console.log('Options:');
    console.log('  --output, -o     Write the drawing to a file instead of stdout');
    console.log(`  --style, -s      Character set: ${CHARACTER_SET_NAMES.join('|')} (default: unicode)`);
    console.log('  --direction, -d  Override the diagram direction: TD|BT|LR|RL');
    console.log('  --format, -f     Output format: text|json (default: text)');
    console.log(`  --type, -t       Skip header detection: ${SUPPORTED_DIAGRAM_TYPES.join('|')}`);
    console.log('  --node-sep, --rank-sep, --padding, --passes   Layout spacing in cells');
    console.log('  --diamond        Decision node style: tall|box|inline (default: tall)');
    console.log('  --color          Colour node labels from classDef/style fills');
    console.log('  --log-level      silent|error|info|debug (default: error)');
}

function readInput(arg: string): { content: string; filename: string } {
    if (arg === '-') {
        return { content: fs.readFileSync(0, 'utf8'), filename: '<stdin>' };
    }
    if (!fs.existsSync(arg)) {
        console.error(`File not found: ${arg}`);
        process.exit(1);
    }
    return { content: fs.readFileSync(arg, 'utf8'), filename: arg };
}

function isDirectory(p: string) {
    try { return fs.statSync(p).isDirectory(); } catch { return false; }
}

const DEFAULT_INCLUDE_GLOBS = [
  '**/*.md',
  '**/*.markdown',
  '**/*.mmd',
  '**/*.mermaid',
];

const DEFAULT_IGNORE_DIRS = [
  '**/.git/**',
  '**/node_modules/**',
  '**/dist/**',
  '**/coverage/**'
];

async function listCandidateFiles(root: string): Promise<string[]> {
    const files = await globby(DEFAULT_INCLUDE_GLOBS, {
      cwd: path.resolve(root),
      absolute: true,
      dot: true,
      gitignore: true,
      ignore: DEFAULT_IGNORE_DIRS,
      followSymbolicLinks: false,
    });
    return files.sort();
}

async function inputsOf(target: string): Promise<Array<{ content: string; filename: string }>> {
    if (!isDirectory(target)) return [readInput(target)];
    const files = await listCandidateFiles(target);
    return files.map((file) => ({ content: fs.readFileSync(file, 'utf8'), filename: file }));
}

type FileRun = { file: string; content: string; outputs: string[]; diagnostics: ValidationError[]; diagramCount: number };

function runFile(filename: string, content: string, options: CliOptions, logger: EngineLogger): FileRun {
    const run: FileRun = { file: filename, content, outputs: [], diagnostics: [], diagramCount: 0 };
    const settings = {
        style: options.style,
        direction: options.direction,
        format: options.format,
        layout: options.layout,
        color: options.color,
        logger,
    };

    if (isGraphFile(filename)) {
        run.diagramCount = 1;
        try {
            run.outputs.push(renderGraph(readGraphJson(content), settings));
        } catch (error) {
            if (!isDiagramError(error)) throw error;
            run.diagnostics.push({ line: 1, column: 1, severity: 'error', code: error.code, message: error.message });
        }
        return run;
    }

    const renderer = new DiagramRenderer();
    for (const source of diagramsIn(filename, content)) {
        run.diagramCount++;
        const result = renderer.render(source.content, { ...settings, type: options.type });
        if (result.errors.length === 0) run.outputs.push(result.output);
        run.diagnostics.push(...offsetErrors([...result.errors, ...result.warnings], source.lineOffset));
    }
    logger.debug('File processed', { phase: 'cli', file: filename, count: run.diagramCount });
    return run;
}

function parseOrExit(args: string[]): ParsedArgs {
    let parsed: ParsedArgs;
    try {
        parsed = parseCliArgs(args);
    } catch (error) {
        if (!isDiagramError(error)) throw error;
        console.error(`Error: ${error.message}`);
        process.exit(1);
    }
    if (parsed.help) {
        printUsage();
        process.exit(0);
    }
    return parsed;
}

function reportDiagnostics(runs: FileRun[]) {
    for (const r of runs) {
        if (r.diagnostics.length === 0) continue;
        console.error(textReport(r.file, r.content, r.diagnostics, { color: process.stderr.isTTY }).trimEnd());
    }
}

function hasErrors(runs: FileRun[]) {
    return runs.some((r) => r.diagnostics.some((d) => d.severity === 'error'));
}

async function handleRenderCommand(args: string[]) {
    const { positionals, options } = parseOrExit(args);
    const target = positionals[0];
    if (!target) {
        console.error('Error: No input file specified');
        process.exit(1);
    }
    const logger = createLogger('gridchart', options.logLevel);
    const runs = (await inputsOf(target)).map(({ content, filename }) => runFile(filename, content, options, logger));

    const outputs = runs.flatMap((r) => r.outputs);
    const body = options.format === 'json' && outputs.length > 1 ? `[\n${outputs.join(',\n')}\n]` : outputs.join('\n\n');
    if (options.output) {
        fs.writeFileSync(options.output, `${body}\n`, 'utf8');
        logger.info(`Wrote ${outputs.length} diagram(s) to ${options.output}`);
    } else if (outputs.length > 0) {
        process.stdout.write(`${body}\n`);
    }

    reportDiagnostics(runs);
    process.exit(hasErrors(runs) ? 1 : 0);
}

async function handleValidateCommand(args: string[]) {
    const { positionals, options } = parseOrExit(args);
    const target = positionals[0];
    if (!target) {
        console.error('Error: No input file specified');
        process.exit(1);
    }
    const logger = createLogger('gridchart', options.logLevel);
    const runs = (await inputsOf(target)).map(({ content, filename }) => runFile(filename, content, { ...options, format: 'text' }, logger));
    const diagramCount = runs.reduce((n, r) => n + r.diagramCount, 0);

    if (options.format === 'json') {
        const files = runs.map((r) => toJsonResult(r.file, r.diagnostics));
        const errorCount = files.reduce((n, f) => n + f.errorCount, 0);
        const warningCount = files.reduce((n, f) => n + f.warningCount, 0);
        console.log(JSON.stringify({ valid: errorCount === 0, files, errorCount, warningCount, diagramCount }, null, 2));
    } else if (diagramCount === 0) {
        console.log('No diagrams found.');
    } else if (runs.every((r) => r.diagnostics.length === 0)) {
        console.log(diagramCount === 1 ? 'Valid' : `All ${diagramCount} diagrams valid.`);
    } else {
        reportDiagnostics(runs);
    }
    process.exit(hasErrors(runs) ? 1 : 0);
}

async function handleDetectCommand(args: string[]) {
    const { positionals } = parseOrExit(args);
    const target = positionals[0];
    if (!target) {
        console.error('Error: No input file specified');
        process.exit(1);
    }
    const { content, filename } = readInput(target);
    const types = diagramsIn(filename, content).map((d) => detectDiagramType(d.content));
    console.log(types.length > 0 ? types.join('\n') : 'unknown');
    process.exit(types.length > 0 && types.every((t) => t !== 'unknown') ? 0 : 1);
}

function handleTypesCommand(args: string[]) {
    const { json } = parseOrExit(args);
    if (json) {
        console.log(JSON.stringify({ types: SUPPORTED_DIAGRAM_TYPES, styles: CHARACTER_SET_NAMES }, null, 2));
    } else {
        for (const t of SUPPORTED_DIAGRAM_TYPES) console.log(t);
    }
}

async function main() {
    const args = process.argv.slice(2);
    const [command, ...rest] = args;

    if (!command || command === '-h' || command === '--help') {
        printUsage();
        process.exit(command ? 0 : 1);
    }

    switch (command) {
        case 'render':
            await handleRenderCommand(rest);
            return;
        case 'validate':
            await handleValidateCommand(rest);
            return;
        case 'detect':
            await handleDetectCommand(rest);
            return;
        case 'types':
            handleTypesCommand(rest);
            return;
        default:
            // `gridchart <file>` is shorthand for render
            await handleRenderCommand(args);
    }
}

main().catch((err) => {
    console.error(err instanceof Error ? err.stack ?? err.message : String(err));
    process.exit(1);
});
