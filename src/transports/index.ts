/**
 * Transport Selection
 *
 * stdio for desktop MCP clients, Streamable HTTP for web clients
 * and the REST/OpenAPI surface.
 */

export type TransportType = 'stdio' | 'http';

export interface TransportConfig {
  type: TransportType;
  port?: number;
  host?: string;
  corsOrigins?: string[];
}

const DEFAULT_PORT = 3000;

function parsePort(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const port = parseInt(value, 10);
  return Number.isInteger(port) && port > 0 && port < 65536 ? port : undefined;
}

/**
 * Determines transport configuration from CLI args and environment variables.
 *
 * Priority order:
 * 1. CLI flag: --stdio, or --http / --port <n>
 * 2. Environment variable: MCP_TRANSPORT
 * 3. Default: stdio
 *
 * @example
 * ```bash
 * domain-checker-mcp --http --port 3001
 * MCP_TRANSPORT=http MCP_PORT=3001 domain-checker-mcp
 * ```
 */
export function getTransportConfig(
  args: string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env,
): TransportConfig {
  if (args.includes('--stdio')) {
    return { type: 'stdio' };
  }

  const portFlagIndex = args.indexOf('--port');
  const portFromFlag =
    portFlagIndex !== -1 ? parsePort(args[portFlagIndex + 1]) : undefined;

  const isHttpMode =
    args.includes('--http') ||
    portFlagIndex !== -1 ||
    env.MCP_TRANSPORT === 'http';

  if (!isHttpMode) {
    return { type: 'stdio' };
  }

  const corsOrigins = env.CORS_ORIGINS
    ? env.CORS_ORIGINS.split(',').map((s) => s.trim()).filter((s) => s.length > 0)
    : ['*'];

  return {
    type: 'http',
    port: portFromFlag ?? parsePort(env.MCP_PORT) ?? DEFAULT_PORT,
    host: env.MCP_HOST || '0.0.0.0',
    corsOrigins,
  };
}

export function formatTransportInfo(config: TransportConfig): string {
  if (config.type === 'stdio') {
    return 'stdio (standard I/O)';
  }
  return `Streamable HTTP on ${config.host}:${config.port}`;
}
