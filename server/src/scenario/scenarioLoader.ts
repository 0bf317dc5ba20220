import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { ScenarioError, errorMessage } from '../lib/errors.js';
import type { Scenario } from '../types.js';
import { scenarioSchema } from './scenarioSchema.js';

export function parseScenario(input: unknown): Scenario {
  const result = scenarioSchema.safeParse(input);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new ScenarioError(`Invalid scenario: ${details}`);
  }
  return Object.freeze({
    ...result.data,
    teams: result.data.teams.map((team) => Object.freeze({ ...team })),
  });
}

export async function loadScenario(filePath: string): Promise<Scenario> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf8');
  } catch (error) {
    const missing = error instanceof Error && 'code' in error && error.code === 'ENOENT';
    throw new ScenarioError(`Cannot read scenario ${filePath}: ${errorMessage(error)}`, {
      cause: error,
      code: missing ? 'SCENARIO_NOT_FOUND' : 'INVALID_SCENARIO',
    });
  }
  let document: unknown;
  try {
    document = JSON.parse(raw);
  } catch (error) {
    throw new ScenarioError(`Scenario ${filePath} is not valid JSON: ${errorMessage(error)}`, { cause: error });
  }
  const scenario = parseScenario(document);
  // Build contexts are relative to the scenario file.
  const baseDir = path.dirname(path.resolve(filePath));
  return Object.freeze({
    ...scenario,
    teams: scenario.teams.map((team) =>
      Object.freeze(team.build ? { ...team, build: { ...team.build, context: path.resolve(baseDir, team.build.context) } } : team),
    ),
  });
}
