import { type EnvSource, readEnv, readNumEnv } from './env';

export interface NotificationConfig {
    senderAddress?: string;
    senderCredential?: string;
    recipients?: string; // comma-separated, as configured
    smtpHost: string;
    smtpPort: number;
    smtpTimeoutMs: number;
}

export type OracleMode = 'http' | 'gemini';

export interface OracleConfig {
    mode: OracleMode;
    url?: string;
    timeoutMs: number;
    apiKey?: string;
    model: string;
}

export interface ServerConfig {
    port: number;
    uploadLimit: string;
    sessionIdleTtlMs: number;
}

export function loadNotificationConfig(env: EnvSource = process.env): NotificationConfig {
    return {
        senderAddress: readEnv('REPORT_SENDER_EMAIL', env),
        senderCredential: readEnv('REPORT_SENDER_PASSWORD', env),
        recipients: readEnv('REPORT_RECIPIENTS', env),
        smtpHost: readEnv('SMTP_HOST', env) ?? 'smtp.gmail.com',
        smtpPort: readNumEnv('SMTP_PORT', 587, env),
        smtpTimeoutMs: readNumEnv('SMTP_TIMEOUT_MS', 20000, env)
    };
}

export function loadOracleConfig(env: EnvSource = process.env): OracleConfig {
    const mode = readEnv('ORACLE_MODE', env)?.toLowerCase();
    return {
        mode: mode === 'gemini' ? 'gemini' : 'http',
        url: readEnv('ORACLE_URL', env),
        timeoutMs: readNumEnv('ORACLE_TIMEOUT_MS', 120000, env),
        apiKey: readEnv('API_KEY', env),
        model: readEnv('ORACLE_MODEL', env) ?? 'gemini-2.5-flash'
    };
}

export function loadServerConfig(env: EnvSource = process.env): ServerConfig {
    return {
        port: readNumEnv('PORT', 8080, env),
        uploadLimit: readEnv('UPLOAD_LIMIT', env) ?? '50mb',
        sessionIdleTtlMs: readNumEnv('SESSION_IDLE_TTL_MS', 30 * 60 * 1000, env)
    };
}
