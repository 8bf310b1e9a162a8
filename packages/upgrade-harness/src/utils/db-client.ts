/**
 * Database client seam.
 *
 * The harness talks to a running server through this interface only.
 */

import { createClient } from "edgedb";

export interface DatabaseClient {
  /** Resolves once a connection is established, rejects if it cannot be */
  ensureConnected(): Promise<void>;
  execute(statement: string): Promise<void>;
  /** Query returning its result set as a JSON document */
  queryJSON(query: string): Promise<string>;
  close(): Promise<void>;
}

export interface ConnectOptions {
  host: string;
  port: number;
  database?: string;
}

export type ClientFactory = (options: ConnectOptions) => DatabaseClient;

/**
 * Client for a local test-mode server, without TLS verification
 */
export const createDatabaseClient: ClientFactory = ({ host, port, database }) => {
  const client = createClient({
    host,
    port,
    database,
    tlsSecurity: "insecure",
    // Readiness is polled by the orchestrator; fail each attempt fast.
    waitUntilAvailable: 0,
  });

  return {
    async ensureConnected() {
      await client.ensureConnected();
    },
    async execute(statement) {
      await client.execute(statement);
    },
    queryJSON(query) {
      return client.queryJSON(query);
    },
    close() {
      return client.close();
    },
  };
};
