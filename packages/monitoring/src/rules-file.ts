import { readFileSync } from 'fs';
import { z } from 'zod';
import { ConfigurationError, errorMessage } from '@dishwatch/core';
import { alertRuleSchema, type AlertRuleInput } from './alert-engine';

const rulesFileSchema = z.array(alertRuleSchema).max(1000);

/**
 * Read extra alert rules from a JSON file holding an array of rules.
 */
export function loadRulesFile(path: string): AlertRuleInput[] {
  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read alert rules file ${path}`, [errorMessage(error)]);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`Alert rules file ${path} is not valid JSON`, [errorMessage(error)]);
  }

  const parsed = rulesFileSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid alert rules file ${path}`, issues);
  }
  return parsed.data;
}
