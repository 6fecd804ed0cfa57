import { ConfigError, describeError } from '@waypoint/core';

/** Connection settings in the shape `mssql` accepts, minus pool tuning. */
export interface SqlServerConnectionConfig {
    server: string;
    port?: number;
    database?: string;
    user?: string;
    password?: string;
    options: {
        encrypt: boolean;
        trustServerCertificate: boolean;
        instanceName?: string;
    };
}

/** A parsed URI, or an ADO-style string handed to `mssql` untouched. */
export type SqlServerConnection =
    | { format: 'config'; config: SqlServerConnectionConfig }
    | { format: 'ado'; connectionString: string };

const URI_SCHEME = /^(?:mssql(?:\+[a-z0-9_.-]+)?|sqlserver):\/\//i;
const TRUTHY = new Set(['true', 'yes', '1']);

export function parseSqlServerConnection(connectionString: string): SqlServerConnection {
    if (!URI_SCHEME.test(connectionString)) {
        return { format: 'ado', connectionString };
    }

    let url: URL;
    try {
        url = new URL(connectionString);
    } catch (error) {
        throw new ConfigError(`Invalid SQL Server connection URI: ${describeError(error)}`, { cause: error });
    }

    if (!url.hostname) {
        throw new ConfigError('Invalid SQL Server connection URI: missing host');
    }

    const query = lowerCaseKeys(url.searchParams);
    const database = decodeURIComponent(url.pathname.replace(/^\//, ''));
    const instanceName = query.get('instancename');

    const config: SqlServerConnectionConfig = {
        server: url.hostname,
        options: {
            encrypt: flag(query.get('encrypt'), true),
            trustServerCertificate: flag(query.get('trustservercertificate'), false)
        }
    };

    if (url.port) config.port = parsePort(url.port);
    if (database) config.database = database;
    if (url.username) config.user = decodeURIComponent(url.username);
    if (url.password) config.password = decodeURIComponent(url.password);
    if (instanceName) config.options.instanceName = instanceName;

    return { format: 'config', config };
}

function lowerCaseKeys(params: URLSearchParams): Map<string, string> {
    const result = new Map<string, string>();
    params.forEach((value, key) => {
        result.set(key.toLowerCase(), value);
    });
    return result;
}

function flag(value: string | undefined, fallback: boolean): boolean {
    if (value === undefined) return fallback;
    return TRUTHY.has(value.toLowerCase());
}

function parsePort(raw: string): number {
    const port = Number(raw);
    if (!Number.isInteger(port) || port < 1 || port > 65_535) {
        throw new ConfigError(`Invalid SQL Server port: ${raw}`);
    }
    return port;
}
