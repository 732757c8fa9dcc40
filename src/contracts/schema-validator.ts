import Ajv2020Lib from 'ajv/dist/2020.js';
import addFormatsLib from 'ajv-formats';
import type { ValidateFunction } from 'ajv';

const Ajv2020 = Ajv2020Lib.default;
const addFormats = addFormatsLib.default;
import { readFileSync, existsSync, readdirSync } from 'fs';
import { join } from 'path';
import { logger } from '../config/logger.js';

const SCHEMA_BASE = 'https://bedside-triage.example.com/schemas';

export const SchemaIds = {
    requestReceived: `${SCHEMA_BASE}/events/patient-request-received.json`,
    decisionRecorded: `${SCHEMA_BASE}/events/triage-decision-recorded.json`,
    slaBreached: `${SCHEMA_BASE}/events/approval-sla-breached.json`,
    staffNotification: `${SCHEMA_BASE}/events/staff-notification.json`,
    opsAlert: `${SCHEMA_BASE}/events/ops-alert-raised.json`,
    processRequest: `${SCHEMA_BASE}/api/process-request.json`,
    resolveApproval: `${SCHEMA_BASE}/api/resolve-approval.json`,
    auditRecord: `${SCHEMA_BASE}/records/audit-record.json`,
    triageRules: `${SCHEMA_BASE}/config/triage-rules.json`,
    patientDirectory: `${SCHEMA_BASE}/config/patient-directory.json`,
} as const;

export type SchemaId = (typeof SchemaIds)[keyof typeof SchemaIds];

export type ValidationResult<T = unknown> =
    | { valid: true; value: T; errors?: undefined }
    | { valid: false; errors: string };

export class SchemaValidator {
    private ajv: InstanceType<typeof Ajv2020>;
    private schemasLoaded = false;

    constructor(private contractsPath: string) {
        this.ajv = new Ajv2020({
            validateSchema: false, // meta-schema is not bundled with the contracts
            strict: false,
            allErrors: true,
        });
        addFormats(this.ajv);
    }

    /**
     * Load all JSON schemas from the contracts directory
     */
    loadSchemas(): void {
        if (!existsSync(this.contractsPath)) {
            logger.error({ path: this.contractsPath }, 'Contracts directory not found');
            return;
        }

        const files = this.getAllJsonFiles(this.contractsPath);
        logger.info({ count: files.length, path: this.contractsPath }, 'Loading schemas');

        files.forEach((file) => {
            try {
                const schema: unknown = JSON.parse(readFileSync(file, 'utf-8'));

                if (isSchemaWithId(schema)) {
                    this.ajv.addSchema(schema);
                    logger.debug({ $id: schema.$id, file }, 'Schema loaded');
                } else {
                    logger.warn({ file }, 'Schema missing $id, skipped');
                }
            } catch (err) {
                logger.error({ file, error: err }, 'Failed to load schema');
            }
        });

        this.schemasLoaded = true;
        logger.info('All schemas loaded successfully');
    }

    /**
     * Recursively get all JSON files from a directory
     */
    private getAllJsonFiles(dir: string): string[] {
        const files: string[] = [];

        try {
            const entries = readdirSync(dir, { withFileTypes: true });

            for (const entry of entries) {
                const fullPath = join(dir, entry.name);

                if (entry.isDirectory()) {
                    files.push(...this.getAllJsonFiles(fullPath));
                } else if (entry.isFile() && entry.name.endsWith('.json')) {
                    files.push(fullPath);
                }
            }
        } catch (err) {
            logger.error({ dir, error: err }, 'Failed to read directory');
        }

        return files;
    }

    /**
     * Validate data against a schema by its $id. On success the value is
     * returned typed as `T`; the schema is the source of truth for that shape.
     */
    validate<T = unknown>(schemaId: SchemaId, data: unknown): ValidationResult<T> {
        if (!this.schemasLoaded) {
            logger.warn('Schemas not loaded, validation will fail');
            return {
                valid: false,
                errors: 'Schemas not loaded',
            };
        }

        const validateFn: ValidateFunction<T> | undefined = this.ajv.getSchema<T>(schemaId);

        if (!validateFn) {
            logger.error({ schemaId }, 'Schema not found');
            return {
                valid: false,
                errors: `Schema not found: ${schemaId}`,
            };
        }

        if (!validateFn(data)) {
            return {
                valid: false,
                errors: this.ajv.errorsText(validateFn.errors),
            };
        }

        return { valid: true, value: data };
    }

    validateRequestReceived<T>(data: unknown): ValidationResult<T> {
        return this.validate<T>(SchemaIds.requestReceived, data);
    }
}

function isSchemaWithId(value: unknown): value is { $id: string } {
    return (
        typeof value === 'object' &&
        value !== null &&
        '$id' in value &&
        typeof value.$id === 'string'
    );
}
