export const PROTOCOLS = ['dot', 'doh'] as const;
export type Protocol = (typeof PROTOCOLS)[number];

export type ServerConfig = {
  name: string;
  address: string;
  port: number;
  protocol: Protocol;
  priority: number;
  // DoH request path on the server.
  dohPath: string;
  // SNI / certificate name. Defaults to `address` when that is a host name.
  tlsServername?: string;
};

/** One encrypted transport to a server; callers never run two queries on it at once. */
export interface UpstreamConnection {
  readonly protocol: Protocol;
  readonly closed: boolean;
  query(message: Buffer, signal: AbortSignal): Promise<Buffer>;
  close(): Promise<void>;
}

export type ConnectionFactory = (server: ServerConfig, signal: AbortSignal) => Promise<UpstreamConnection>;
