// Plan loader: reads a plan YAML file, validates it and hands back step
// configuration records plus the tests known to the plan.
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { RESULT_INTERPRETATIONS } from '../result.js';
import { GuestrunError, GuestrunErrorCode, isErrnoException } from '../shared/errors.js';
import type { TestMetadata } from '../discover/index.js';
import type { RawStepData } from '../steps/types.js';

const stepRecordSchema = z
  .object({
    how: z.string().min(1).optional(),
    name: z.string().min(1).optional(),
  })
  .passthrough();

const stepSchema = z
  .union([stepRecordSchema, z.array(stepRecordSchema)])
  .optional()
  .transform(value => (value === undefined ? [] : Array.isArray(value) ? value : [value]));

const testSchema = z.object({
  name: z.string().min(1),
  test: z.string().min(1),
  framework: z.enum(['shell', 'beakerlib']).optional(),
  duration: z.string().min(1).optional(),
  result: z.enum(RESULT_INTERPRETATIONS).optional(),
  environment: z.record(z.string(), z.union([z.string(), z.number(), z.boolean()]).transform(String)).optional(),
  path: z.string().optional(),
  summary: z.string().optional(),
  tags: z.array(z.string()).optional(),
  require: z.array(z.string()).optional(),
});

const planSchema = z.object({
  summary: z.string().optional(),
  execute: stepSchema,
  report: stepSchema,
  tests: z.array(testSchema).default([]),
});

export interface PlanConfig {
  summary?: string;
  execute: RawStepData[];
  report: RawStepData[];
  tests: TestMetadata[];
}

export function parsePlanConfig(yamlText: string, source = '<inline>'): PlanConfig {
  let raw: unknown;
  try {
    raw = parseYaml(yamlText);
  } catch (e) {
    throw new GuestrunError(
      GuestrunErrorCode.SPECIFICATION_ERROR,
      `Invalid YAML in ${source}: ${e instanceof Error ? e.message : String(e)}`
    );
  }

  const parsed = planSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new GuestrunError(GuestrunErrorCode.SPECIFICATION_ERROR, `Invalid plan in ${source}.`, {
      issues: parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`),
    });
  }

  const seen = new Set<string>();
  for (const test of parsed.data.tests) {
    if (seen.has(test.name)) {
      throw new GuestrunError(GuestrunErrorCode.SPECIFICATION_ERROR, `Duplicate test name '${test.name}' in ${source}.`);
    }
    seen.add(test.name);
  }

  return {
    summary: parsed.data.summary,
    execute: parsed.data.execute,
    report: parsed.data.report,
    tests: parsed.data.tests,
  };
}

export async function loadPlanConfig(filePath: string): Promise<PlanConfig> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    throw new GuestrunError(
      isErrnoException(err, 'ENOENT') ? GuestrunErrorCode.SPECIFICATION_ERROR : GuestrunErrorCode.FILE_ERROR,
      `Unable to read plan '${filePath}'.`,
      { cause: err instanceof Error ? err.message : String(err) }
    );
  }
  return parsePlanConfig(text, filePath);
}

/** Root under which plan workdirs are created when none is given. */
export function workdirRoot(): string {
  return process.env['GUESTRUN_WORKDIR_ROOT'] ?? path.join(os.tmpdir(), 'guestrun');
}
