import { readFileSync, existsSync } from 'fs';
import { logger } from '../config/logger.js';
import { SchemaIds, type SchemaValidator } from '../contracts/schema-validator.js';
import type { PatientContext, PatientContextProvider } from './types.js';

interface PatientDirectoryFile {
    patients: PatientContext[];
}

/** Patient records held in memory, optionally seeded from a JSON file. */
export class PatientDirectory implements PatientContextProvider {
    private patients = new Map<string, PatientContext>();

    constructor(patients: readonly PatientContext[] = []) {
        patients.forEach((p) => this.patients.set(p.hospitalId, p));
    }

    static fromFile(path: string, validator: SchemaValidator): PatientDirectory {
        if (!existsSync(path)) {
            logger.warn({ path }, 'Patient directory file not found, starting empty');
            return new PatientDirectory();
        }

        let content: unknown;
        try {
            content = JSON.parse(readFileSync(path, 'utf-8'));
        } catch (err) {
            logger.error({ path, error: err }, 'Failed to read patient directory');
            throw new Error(`Failed to read patient directory ${path}: ${err}`);
        }

        const result = validator.validate<PatientDirectoryFile>(SchemaIds.patientDirectory, content);
        if (!result.valid) {
            throw new Error(`Invalid patient directory ${path}: ${result.errors}`);
        }

        logger.info({ path, count: result.value.patients.length }, 'Patient directory loaded');
        return new PatientDirectory(result.value.patients);
    }

    async lookup(hospitalId: string): Promise<PatientContext | null> {
        return this.patients.get(hospitalId) ?? null;
    }

    size(): number {
        return this.patients.size;
    }
}
