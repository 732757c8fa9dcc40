import { config } from 'dotenv';

// Load .env file if present
config();

export interface AppConfig {
    nats: {
        url: string;
        stream: string;
        durable: string;
    };
    contracts: {
        path: string;
    };
    rules: {
        path: string;
    };
    patients: {
        path: string;
    };
    audit: {
        logPath: string | null;
        maxAttempts: number;
        baseDelayMs: number;
    };
    history: {
        ttlMs: number;
        maxTurns: number;
    };
    approvals: {
        slaSweepIntervalMs: number;
    };
    notifications: {
        maxAttempts: number;
        baseDelayMs: number;
        waitMs: number;
    };
    staffing: {
        defaultNurseId: string;
        defaultPhysicianId: string;
        emergencyTeamId: string;
    };
    pipeline: {
        deadlineMs: number;
    };
    http: {
        port: number;
    };
    log: {
        level: string;
    };
}

function getEnv(key: string, defaultValue: string): string {
    return process.env[key] || defaultValue;
}

function getOptionalEnv(key: string): string | null {
    const value = process.env[key];
    return value ? value : null;
}

function getEnvNumber(key: string, defaultValue: number): number {
    const value = process.env[key];
    if (!value) return defaultValue;
    const parsed = parseInt(value, 10);
    if (isNaN(parsed)) {
        throw new Error(`Invalid number for environment variable ${key}: ${value}`);
    }
    return parsed;
}

export function loadConfig(): AppConfig {
    return {
        nats: {
            url: getEnv('NATS_URL', 'nats://localhost:4222'),
            stream: getEnv('NATS_STREAM', 'bedside'),
            durable: getEnv('NATS_DURABLE', 'request-triage'),
        },
        contracts: {
            path: getEnv('CONTRACTS_PATH', './contracts'),
        },
        rules: {
            path: getEnv('RULES_PATH', './rules/default.json'),
        },
        patients: {
            path: getEnv('PATIENTS_PATH', './data/patients.json'),
        },
        audit: {
            logPath: getOptionalEnv('AUDIT_LOG_PATH'),
            maxAttempts: getEnvNumber('AUDIT_MAX_ATTEMPTS', 5),
            baseDelayMs: getEnvNumber('AUDIT_BASE_DELAY_MS', 200),
        },
        history: {
            ttlMs: getEnvNumber('HISTORY_TTL_MS', 3600000), // 1 hour default
            maxTurns: getEnvNumber('HISTORY_MAX_TURNS', 10),
        },
        approvals: {
            slaSweepIntervalMs: getEnvNumber('SLA_SWEEP_INTERVAL_MS', 30000),
        },
        notifications: {
            maxAttempts: getEnvNumber('NOTIFY_MAX_ATTEMPTS', 3),
            baseDelayMs: getEnvNumber('NOTIFY_BASE_DELAY_MS', 250),
            waitMs: getEnvNumber('NOTIFY_WAIT_MS', 2000),
        },
        staffing: {
            defaultNurseId: getEnv('DEFAULT_NURSE_ID', 'CHARGE_NURSE'),
            defaultPhysicianId: getEnv('DEFAULT_PHYSICIAN_ID', 'ON_CALL_PHYSICIAN'),
            emergencyTeamId: getEnv('EMERGENCY_TEAM_ID', 'RAPID_RESPONSE_TEAM'),
        },
        pipeline: {
            deadlineMs: getEnvNumber('REQUEST_DEADLINE_MS', 250),
        },
        http: {
            port: getEnvNumber('HTTP_PORT', 8093),
        },
        log: {
            level: getEnv('LOG_LEVEL', 'info'),
        },
    };
}
