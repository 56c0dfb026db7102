#!/usr/bin/env node

import * as fs from 'node:fs';
import * as path from 'node:path';
import { globby } from 'globby';
import { ZodError } from 'zod';
import { resolveConfig, type ViewerConfig, type ViewerConfigInput } from './core/config.js';
import { renderReport, toJsonResult } from './core/format.js';
import { GraphvizLayoutEngine, renderGraph, SvgRenderer, type RenderResult } from './renderer/index.js';
import { Graph } from './scene/graph.js';
import { summarizeGraph } from './scene/summary.js';
import { Viewport } from './viewer/viewport.js';

function printUsage() {
    console.log('Usage: xdotview [options] [file]');
    console.log('       cat graph.dot | xdotview -');
    console.log('       xdotview <directory>');
    console.log('  - Lays out a Graphviz graph and renders it to SVG');
    console.log('  - Input that already carries xdot drawing attributes is not laid out again');
    console.log('  - Without a file, renders the empty graph');
    console.log('  - When a directory is given, renders every .dot/.gv/.xdot file next to its source');
    console.log('Options:');
    console.log('  --output, -o    Output SVG path (default: <input>.svg, stdout for stdin)');
    console.log('  --width         Viewport width in pixels (default: 800)');
    console.log('  --height        Viewport height in pixels (default: 600)');
    console.log('  --margin        Zoom-to-fit margin in pixels (default: 12)');
    console.log('  --program, -K   Graphviz layout program (default: dot)');
    console.log('  --xdot          Treat the input as laid-out xdot');
    console.log('  --format, -f    Report format: text|json (default: text)');
    console.log('  --help, -h      Show this help');
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
    try {
        return fs.statSync(p).isDirectory();
    } catch (e) {
        if (e instanceof Error && 'code' in e && e.code === 'ENOENT') return false;
        throw e;
    }
}

const GRAPH_GLOBS = ['**/*.dot', '**/*.gv', '**/*.xdot'];

async function listGraphFiles(root: string): Promise<string[]> {
    const files = await globby(GRAPH_GLOBS, {
        cwd: path.resolve(root),
        absolute: true,
        gitignore: true,
        ignore: ['**/node_modules/**'],
        followSymbolicLinks: false,
    });
    return files.sort();
}

function svgPathFor(file: string): string {
    return path.join(path.dirname(file), `${path.basename(file, path.extname(file))}.svg`);
}

interface ParsedArgs {
    config: ViewerConfig;
    output: string | null;
    help: boolean;
    positionals: string[];
}

function numberFlag(name: string, value: string | undefined): number {
    const n = Number(value);
    if (value === undefined || value === '' || !Number.isFinite(n)) {
        console.error(`Option ${name} expects a number`);
        process.exit(1);
    }
    return n;
}

function parseArgs(args: string[]): ParsedArgs {
    const input: ViewerConfigInput = {};
    let output: string | null = null;
    let help = false;
    const positionals: string[] = [];
    for (let i = 0; i < args.length; i++) {
        const a = args[i] ?? '';
        if (a === '--help' || a === '-h') { help = true; continue; }
        if (a === '--format' || a === '-f') {
            const v = (args[i + 1] || '').toLowerCase();
            if (v === 'json' || v === 'text') { input.format = v; i++; continue; }
            console.error(`Unknown format: ${v}`);
            process.exit(1);
        }
        if (a === '--output' || a === '-o') { output = args[++i] ?? null; continue; }
        if (a === '--width') { input.width = numberFlag(a, args[++i]); continue; }
        if (a === '--height') { input.height = numberFlag(a, args[++i]); continue; }
        if (a === '--margin') { input.margin = numberFlag(a, args[++i]); continue; }
        if (a === '--program' || a === '-K') { input.program = args[++i]; continue; }
        if (a.startsWith('-K') && a.length > 2) { input.program = a.slice(2); continue; }
        if (a === '--xdot') { input.inputFormat = 'xdot'; continue; }
        if (a === '-' || !a.startsWith('-')) { positionals.push(a); continue; }
        console.error(`Unknown option: ${a}`);
        process.exit(1);
    }
    try {
        return { config: resolveConfig(input), output, help, positionals };
    } catch (e) {
        if (e instanceof ZodError) {
            for (const issue of e.issues) console.error(`Invalid ${issue.path.join('.')}: ${issue.message}`);
            process.exit(1);
        }
        throw e;
    }
}

function render(content: string, config: ViewerConfig): Promise<RenderResult> {
    return renderGraph(content, {
        width: config.width,
        height: config.height,
        margin: config.margin,
        format: config.inputFormat,
        layoutEngine: new GraphvizLayoutEngine({ program: config.program }),
    });
}

// Diagnostics are collected by the render and printed once, after it
function reportText(filename: string, content: string, result: RenderResult) {
    const failure = result.ok ? null : result.error;
    const source = result.xdot ?? content;
    const report = renderReport(filename, source, failure, result.diagnostics, { color: process.stderr.isTTY === true });
    if (report) console.error(report);
}

function emptyGraphSvg(config: ViewerConfig): string {
    const graph = new Graph();
    const viewport = new Viewport(config.width, config.height);
    viewport.zoomToFit(graph, config.margin);
    return new SvgRenderer().render(graph, { viewport });
}

function reportJson(filename: string, result: RenderResult) {
    const scene = result.ok ? { scene: summarizeGraph(result.graph) } : { error: { kind: result.error.kind, message: result.error.message } };
    return toJsonResult(filename, result.diagnostics, scene);
}

async function renderDirectory(root: string, config: ViewerConfig) {
    const files = await listGraphFiles(root);
    if (files.length === 0) {
        console.log('No graph files found.');
        return 0;
    }
    const reports: ReturnType<typeof reportJson>[] = [];
    let failed = 0;
    for (const file of files) {
        const content = fs.readFileSync(file, 'utf8');
        const result = await render(content, config);
        if (result.ok) {
            const out = svgPathFor(file);
            fs.writeFileSync(out, result.svg, 'utf8');
            if (config.format === 'text') console.log(`Rendered ${file} -> ${out}`);
        } else {
            failed++;
        }
        if (config.format === 'text') reportText(file, content, result);
        reports.push(reportJson(file, result));
    }
    if (config.format === 'json') {
        console.log(JSON.stringify({ ok: failed === 0, files: reports, failedCount: failed }, null, 2));
    } else {
        console.log(failed === 0 ? `Rendered ${files.length} graph(s).` : `${failed} of ${files.length} graph(s) failed.`);
    }
    return failed === 0 ? 0 : 1;
}

async function main() {
    const { config, output, help, positionals } = parseArgs(process.argv.slice(2));
    if (help) {
        printUsage();
        process.exit(0);
    }

    const target = positionals[0];

    // No input: the empty graph
    if (target === undefined) {
        const svg = emptyGraphSvg(config);
        if (output) fs.writeFileSync(output, svg, 'utf8');
        else process.stdout.write(svg);
        return;
    }

    if (target !== '-' && isDirectory(target)) {
        process.exit(await renderDirectory(target, config));
    }

    const { content, filename } = readInput(target);
    const result = await render(content, config);

    if (!result.ok) {
        if (config.format === 'json') {
            console.log(JSON.stringify(reportJson(filename, result), null, 2));
        } else {
            reportText(filename, content, result);
        }
        process.exit(1);
    }

    if (config.format === 'text') reportText(filename, content, result);

    const outPath = output ?? (filename === '<stdin>' ? null : svgPathFor(filename));
    if (outPath) {
        fs.writeFileSync(outPath, result.svg, 'utf8');
    } else if (config.format === 'text') {
        process.stdout.write(result.svg);
    }

    if (config.format === 'json') {
        console.log(JSON.stringify(reportJson(filename, result), null, 2));
    } else if (outPath) {
        console.log(`Rendered to SVG: ${outPath}`);
    }
}

main().catch((e: unknown) => {
    console.error(e instanceof Error ? e.message : String(e));
    process.exit(1);
});
