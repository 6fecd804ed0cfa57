import { ConfigError } from '@waypoint/core';

export interface CosmosConnectionSettings {
    endpoint: string;
    key: string;
    /** Present only when the string carries `Database=`. */
    database?: string;
}

/**
 * Parses `AccountEndpoint=...;AccountKey=...;[Database=...;]`. Keys are matched
 * case-insensitively and each value runs up to the next `;`, so base64 keys
 * ending in `=` survive.
 */
export function parseCosmosConnectionString(connectionString: string): CosmosConnectionSettings {
    const entries = new Map<string, string>();

    for (const part of connectionString.split(';')) {
        const separator = part.indexOf('=');
        if (separator <= 0) continue;
        entries.set(part.slice(0, separator).trim().toLowerCase(), part.slice(separator + 1).trim());
    }

    const endpoint = entries.get('accountendpoint');
    const key = entries.get('accountkey');
    if (!endpoint || !key) {
        throw new ConfigError('Cosmos DB connection string must contain AccountEndpoint and AccountKey');
    }

    const database = entries.get('database');
    return database ? { endpoint, key, database } : { endpoint, key };
}
