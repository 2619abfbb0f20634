/** A language server process seen during one detection pass. Never persisted. */
export interface ProcessCandidate {
  pid: number;
  commandLine: string;
  token: string;
  /** Port advertised on the command line (0 when absent). Not necessarily the API port. */
  advertisedPort: number;
  /** Ports the process actually listens on, deduplicated and ascending. */
  listeningPorts: number[];
}

/** A connection that answered a probe on `port`. */
export interface Connection {
  port: number;
  token: string;
  pid: number;
  advertisedPort: number;
}

/** What the gateway may show of a Connection: everything but the token. */
export type ConnectionSummary = Omit<Connection, 'token'>;
