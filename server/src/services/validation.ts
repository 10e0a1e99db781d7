import fsp from 'fs/promises';
import { constants } from 'fs';
import type { AppConfig } from '../config.js';

export const MIN_SCENARIO_LENGTH = 10;

export interface RequiredCredential {
  name: string;
  value: string | undefined;
  purpose: string;
}

export interface ValidationInput {
  portraitA: string;
  portraitB: string;
  scenario: string;
  credentials: RequiredCredential[];
}

async function checkPortrait(label: string, filePath: string): Promise<string | null> {
  try {
    const stat = await fsp.stat(filePath);
    if (!stat.isFile()) return `${label} is not a file: ${filePath}`;
  } catch {
    return `${label} not found: ${filePath}`;
  }
  try {
    await fsp.access(filePath, constants.R_OK);
  } catch {
    return `${label} is not readable: ${filePath}`;
  }
  return null;
}

/**
 * Pre-flight checks. Every failing check contributes an issue; an empty list
 * means the job may proceed.
 */
export async function validateInputs(input: ValidationInput): Promise<string[]> {
  const issues: string[] = [];

  for (const [label, filePath] of [['Portrait A', input.portraitA], ['Portrait B', input.portraitB]] as const) {
    const issue = await checkPortrait(label, filePath);
    if (issue) issues.push(issue);
  }

  if (!input.scenario || input.scenario.trim().length < MIN_SCENARIO_LENGTH) {
    issues.push(`Scenario description is too short (min ${MIN_SCENARIO_LENGTH} characters)`);
  }

  for (const credential of input.credentials) {
    if (!credential.value) {
      issues.push(`${credential.name} not set (needed for ${credential.purpose})`);
    }
  }

  return issues;
}

/** Credentials the configured collaborators need before a job may start. */
export function requiredCredentials(config: AppConfig): RequiredCredential[] {
  return [
    { name: 'GEMINI_API_KEY', value: config.credentials.geminiApiKey, purpose: 'dialogue generation' },
    { name: 'OPENAI_API_KEY', value: config.credentials.openaiApiKey, purpose: 'scene generation' },
    { name: 'ELEVENLABS_API_KEY', value: config.credentials.elevenLabsApiKey, purpose: 'speech synthesis' },
  ];
}
