#!/usr/bin/env node
/**
 * planwire CLI
 */

import { readFile, writeFile } from 'fs/promises';
import { realpathSync } from 'fs';
import { fileURLToPath } from 'url';
import { Command, InvalidArgumentError } from 'commander';
import { ZodError } from 'zod';
import { loadSettings, type Settings } from './config/settings.js';
import { PlanningRequestSchema, type PlanningRequest } from './models/itinerary.js';
import { PlanwireRuntime } from './runtime.js';

export interface CliIo {
  env: Record<string, string | undefined>;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  createRuntime: (settings: Settings) => PlanwireRuntime;
}

const defaultIo: CliIo = {
  env: process.env,
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
  createRuntime: (settings) => new PlanwireRuntime(settings),
};

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive whole number of milliseconds.');
  }
  return parsed;
}

export async function readPlanningRequest(file: string): Promise<PlanningRequest> {
  const raw: unknown = JSON.parse(await readFile(file, 'utf8'));
  return PlanningRequestSchema.parse(raw);
}

function describeError(error: unknown): string {
  if (error instanceof ZodError) {
    return error.issues.map((issue) => `${issue.path.join('.') || 'request'}: ${issue.message}`).join('\n');
  }
  return error instanceof Error ? error.message : String(error);
}

export function createProgram(io: CliIo = defaultIo): Command {
  const program = new Command();

  program
    .name('planwire')
    .description('Plan a trip with cooperating research, planner and optimizer agents')
    .version('0.1.0');

  program
    .command('plan')
    .description('Plan a trip from a JSON file holding { traveler, request }')
    .argument('<request>', 'path to the planning request JSON')
    .option('-t, --timeout <ms>', 'how long to wait for the optimizer', parsePositiveInt)
    .option('-o, --out <file>', 'write the itinerary here instead of stdout')
    .action(async (requestFile: string, options: { timeout?: number; out?: string }) => {
      let runtime: PlanwireRuntime | undefined;
      try {
        const request = await readPlanningRequest(requestFile);
        const settings = loadSettings(io.env);
        runtime = io.createRuntime(
          options.timeout ? { ...settings, optimizationTimeoutMs: options.timeout } : settings
        );
        runtime.start();

        const itinerary = await runtime.plan(request);
        const json = `${JSON.stringify(itinerary, null, 2)}\n`;
        if (options.out) {
          await writeFile(options.out, json, 'utf8');
          io.stderr(`Itinerary ${itinerary.itineraryId} written to ${options.out}\n`);
        } else {
          io.stdout(json);
        }
      } catch (error) {
        io.stderr(`planwire: ${describeError(error)}\n`);
        process.exitCode = 1;
      } finally {
        await runtime?.shutdown();
      }
    });

  return program;
}

function invokedDirectly(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return realpathSync(entry) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (invokedDirectly()) {
  createProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      process.stderr.write(`planwire: ${describeError(error)}\n`);
      process.exitCode = 1;
    });
}
