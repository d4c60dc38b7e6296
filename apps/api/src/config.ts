export interface ApiConfig {
    port: number;
    jsonBodyLimit: string;
    auditEcho: boolean;
}

export const DEFAULT_CONFIG: Readonly<ApiConfig> = Object.freeze({
    port: 4000,
    jsonBodyLimit: '10mb',
    auditEcho: true,
});

const parsePort = (raw: string | undefined): number => {
    if (raw === undefined || raw.trim() === '') return DEFAULT_CONFIG.port;
    const port = Number(raw);
    if (!Number.isInteger(port) || port < 0 || port > 65535) {
        console.warn(`[API] Ignoring invalid PORT "${raw}", using ${DEFAULT_CONFIG.port}`);
        return DEFAULT_CONFIG.port;
    }
    return port;
};

const parseFlag = (name: string, raw: string | undefined, fallback: boolean): boolean => {
    const value = raw?.trim().toLowerCase();
    if (value === undefined || value === '') return fallback;
    if (value === 'true' || value === '1') return true;
    if (value === 'false' || value === '0') return false;
    console.warn(`[API] Ignoring invalid ${name} "${raw}", using ${fallback}`);
    return fallback;
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): ApiConfig => ({
    port: parsePort(env.PORT),
    jsonBodyLimit: env.JSON_BODY_LIMIT?.trim() || DEFAULT_CONFIG.jsonBodyLimit,
    auditEcho: parseFlag('AUDIT_ECHO', env.AUDIT_ECHO, DEFAULT_CONFIG.auditEcho),
});
