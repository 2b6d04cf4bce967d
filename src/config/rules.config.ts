import { registerAs } from '@nestjs/config';
import * as fs from 'fs';
import * as path from 'path';
import { ConfigurationError } from '../common/errors';
import { deepFreeze } from '../common/deep-freeze';
import { describeZodIssues } from '../common/zod-validation.pipe';
import { RulesDocument, rulesDocumentSchema } from './rules.schema';

export const RULES_CONFIG_KEY = 'rules';

export const DEFAULT_RULES_PATH = path.join(process.cwd(), 'config', 'rules.json');

/**
 * Reads and validates the rule document. Any failure is a ConfigurationError:
 * the engine has nothing to evaluate against without it.
 */
export function loadRulesDocument(filePath: string): RulesDocument {
  if (!fs.existsSync(filePath)) {
    throw new ConfigurationError(`Rule config not found: ${filePath}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Rule config ${filePath} could not be parsed: ${reason}`);
  }

  return parseRulesDocument(raw, filePath);
}

export function parseRulesDocument(raw: unknown, source = 'inline'): RulesDocument {
  const result = rulesDocumentSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(
      `Rule config ${source} is invalid: ${describeZodIssues(result.error).join('; ')}`,
    );
  }
  return deepFreeze(result.data);
}

export const rulesConfig = registerAs(RULES_CONFIG_KEY, () =>
  loadRulesDocument(process.env.RULES_CONFIG_PATH || DEFAULT_RULES_PATH),
);
