import { DATA_DIR } from "../engine/Constants";

export interface ReplConfig {
    dataDir: string;
    persist: boolean;
}

export function resolveConfig(env: Record<string, string | undefined>): ReplConfig {
    const dataDir = env.TABULA_DATA_DIR?.trim();
    return {
        dataDir: dataDir ? dataDir : DATA_DIR,
        persist: env.TABULA_PERSIST !== "0",
    };
}
