import { spawn } from 'node:child_process';
import { error } from '../core/errorBuilder.js';
import { LayoutError } from '../core/errors.js';
import type { ILayoutEngine, LayoutRequest } from './interfaces.js';

export interface GraphvizOptions {
  // dot, neato, fdp, sfdp, twopi, circo
  program?: string;
}

/**
 * Lays out graphs by piping them through a Graphviz program with -Txdot
 */
export class GraphvizLayoutEngine implements ILayoutEngine {
  readonly program: string;

  constructor(options: GraphvizOptions = {}) {
    this.program = options.program ?? 'dot';
  }

  layout(source: string, request: LayoutRequest = {}): Promise<string> {
    const { signal } = request;
    if (signal?.aborted) return Promise.reject(this.aborted());

    return new Promise<string>((resolve, reject) => {
      const child = spawn(this.program, ['-Txdot'], { stdio: ['pipe', 'pipe', 'pipe'], signal });
      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      let settled = false;

      const fail = (e: LayoutError) => {
        if (settled) return;
        settled = true;
        reject(e);
      };

      child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
      child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

      child.on('error', (e: Error) => {
        if (signal?.aborted) return fail(this.aborted());
        fail(new LayoutError(`Could not run ${this.program}: ${e.message}`, [
          error('LAYOUT-SPAWN', `Could not run ${this.program}: ${e.message}`, { hint: 'Is Graphviz installed and on PATH?' }),
        ]));
      });

      child.on('close', (code: number | null) => {
        if (signal?.aborted) return fail(this.aborted());
        if (code !== 0) {
          const message = Buffer.concat(stderr).toString('utf8').trim() || `${this.program} exited with code ${code}`;
          return fail(new LayoutError(message, [error('LAYOUT-FAILED', message)]));
        }
        if (settled) return;
        settled = true;
        resolve(Buffer.concat(stdout).toString('utf8'));
      });

      // A program that exits early closes stdin; the close handler reports the exit
      child.stdin.on('error', (e: Error) => stderr.push(Buffer.from(`${e.message}\n`)));
      child.stdin.end(source, 'utf8');
    });
  }

  private aborted(): LayoutError {
    return new LayoutError('Layout aborted', [error('LAYOUT-ABORTED', 'Layout aborted')], true);
  }
}
