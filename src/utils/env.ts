export type EnvSource = Record<string, string | undefined>;

export function processEnv(): EnvSource {
    if (typeof process !== 'undefined' && typeof process.env !== 'undefined') {
        return process.env;
    }
    return {};
}

