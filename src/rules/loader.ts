import { readFileSync } from 'fs';
import { logger } from '../config/logger.js';
import { SchemaIds, type SchemaValidator } from '../contracts/schema-validator.js';
import type { TriageRules } from './types.js';

export function loadRules(rulesPath: string, validator: SchemaValidator): TriageRules {
    let content: unknown;
    try {
        content = JSON.parse(readFileSync(rulesPath, 'utf-8'));
    } catch (err) {
        logger.error({ rulesPath, error: err }, 'Failed to load rules');
        throw new Error(`Failed to load rules from ${rulesPath}: ${err}`);
    }

    const result = validator.validate<TriageRules>(SchemaIds.triageRules, content);
    if (!result.valid) {
        logger.error({ rulesPath, errors: result.errors }, 'Rules failed validation');
        throw new Error(`Invalid rules in ${rulesPath}: ${result.errors}`);
    }

    logger.info(
        { rulesPath, version: result.value.version },
        'Rules loaded successfully',
    );

    return result.value;
}
