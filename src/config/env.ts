export type EnvSource = Record<string, string | undefined>;

// Blank values count as unset.
export const readEnv = (key: string, env: EnvSource = process.env): string | undefined => {
    const val = env[key];
    if (val === undefined) return undefined;
    const trimmed = val.trim();
    return trimmed.length > 0 ? trimmed : undefined;
};

export const readNumEnv = (key: string, def: number, env: EnvSource = process.env): number => {
    const val = readEnv(key, env);
    if (val === undefined) return def;
    const num = Number(val);
    return Number.isFinite(num) ? num : def;
};
