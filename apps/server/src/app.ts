import type * as http from "http";
import { GraphIndex, QueryService } from "@ontoscope/core";
import type { LoaderOptions, OntologyTables } from "@ontoscope/core";
import { readOntologyFile } from "@ontoscope/core/node";
import type { ServerConfig } from "./config";
import { httpLog, loaderLog, serverLog } from "./logger";
import { createServer, startServer, stopServer } from "./server";

export interface AppDependencies {
  readOntology: (path: string, options: LoaderOptions) => Promise<OntologyTables>;
  listen: (server: http.Server, port: number, host: string) => Promise<void>;
}

export interface RunningApp {
  server: http.Server;
  index: GraphIndex;
  stop: () => Promise<void>;
}

const defaultDependencies: AppDependencies = {
  readOntology: readOntologyFile,
  listen: startServer,
};

function logLoadReport(index: GraphIndex, tables: OntologyTables, config: ServerConfig, elapsedMs: number): void {
  const { report } = tables;
  loaderLog.info(`Loaded ${index.size} terms and ${index.edgeCount} is_a edges in ${elapsedMs}ms`);
  if (report.otherPredicateEdges > 0) {
    loaderLog.verbose(`Ignored ${report.otherPredicateEdges} edges with other predicates`);
  }
  if (report.skippedNodes + report.duplicateNodes + report.malformedEdges + report.danglingEdges + report.duplicateEdges > 0) {
    loaderLog.warn(
      `Dropped ${report.skippedNodes} nodes without id, ${report.duplicateNodes} duplicate nodes, ` +
        `${report.malformedEdges} malformed edges, ${report.danglingEdges} dangling edges, ` +
        `${report.duplicateEdges} duplicate edges`,
    );
  }
  if (!index.lookup(config.rootTermId)) {
    loaderLog.warn(`Root term ${config.rootTermId} is not in the ontology`);
  }
}

/**
 * Loads and indexes the ontology, then opens the listener. A load failure
 * rejects before any socket exists.
 */
export async function startApp(config: ServerConfig, deps: AppDependencies = defaultDependencies): Promise<RunningApp> {
  loaderLog.info(`Loading ontology from ${config.ontologyPath}`);
  const startTime = Date.now();
  const tables = await deps.readOntology(config.ontologyPath, { idPrefix: config.idPrefix });
  const index = GraphIndex.fromTables(tables, { rootId: config.rootTermId });
  logLoadReport(index, tables, config, Date.now() - startTime);

  const server = createServer(new QueryService(index), config, httpLog);
  await deps.listen(server, config.port, config.host);
  serverLog.info(`Listening on http://${config.host}:${config.port}`);
  if (config.webDir) {
    serverLog.info(`Serving client from ${config.webDir}`);
  }

  return { server, index, stop: () => stopServer(server) };
}
