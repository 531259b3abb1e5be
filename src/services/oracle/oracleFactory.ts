import type { OracleConfig } from '../../config/reportConfig';
import type { FaultOracle } from '../../types';
import { createGeminiOracle } from './geminiOracle';
import { createHttpOracle } from './httpOracle';

export function isOracleConfigured(config: OracleConfig): boolean {
    return config.mode === 'gemini' ? !!config.apiKey : !!config.url;
}

export function createOracle(config: OracleConfig): FaultOracle {
    if (config.mode === 'gemini') {
        if (!config.apiKey) throw new Error('API Key missing. Please set API_KEY.');
        return createGeminiOracle({ apiKey: config.apiKey, model: config.model });
    }
    if (!config.url) throw new Error('Oracle endpoint missing. Please set ORACLE_URL.');
    return createHttpOracle({ url: config.url, timeoutMs: config.timeoutMs });
}
