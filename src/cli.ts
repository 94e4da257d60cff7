#!/usr/bin/env node
import { realpathSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { Command, Option } from 'commander';
import { Writer, type Store } from 'n3';
import { SparqlClient, type SparqlClientOptions } from './lib/client.js';
import { loadConfig } from './lib/config.js';
import type { QueryResult } from './lib/converters.js';
import { responseText } from './lib/http.js';
import type { Binding } from './lib/literals.js';
import { createConsoleLogger } from './lib/logger.js';
import {
  askQuery,
  constructQuery,
  describeQuery,
  selectQuery,
  type QueryInput,
  type QueryType
} from './lib/query.js';
import { valueToDisplay } from './lib/util.js';

type QueryCommandOptions = {
  endpoint?: string;
  format?: string;
  convert: boolean;
  parse: boolean;
  type?: QueryType;
  defaultGraphUri: string[];
  namedGraphUri: string[];
  versionParam?: string;
};

type UpdateCommandOptions = {
  endpoint?: string;
  parse: boolean;
  usingGraphUri: string[];
  usingNamedGraphUri: string[];
  versionParam?: string;
};

export type CliDeps = {
  env?: Record<string, string | undefined>;
  write?: (line: string) => void;
  /** Extra client options, e.g. a borrowed HttpClient. */
  client?: Partial<SparqlClientOptions>;
};

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function typedQuery(text: string, type: QueryType | undefined): QueryInput {
  switch (type) {
    case undefined:
      return text;
    case 'select':
      return selectQuery(text);
    case 'ask':
      return askQuery(text);
    case 'construct':
      return constructQuery(text);
    case 'describe':
      return describeQuery(text);
  }
}

function optional(values: string[]): string[] | undefined {
  return values.length ? values : undefined;
}

export function formatBindings(bindings: Binding[]): string[] {
  return bindings.map((row) =>
    Object.entries(row)
      .map(([name, value]) => `${name}=${valueToDisplay(value)}`)
      .join('\t')
  );
}

export function toNTriples(graph: Store): Promise<string> {
  return new Promise((resolve, reject) => {
    const writer = new Writer({ format: 'N-Triples' });
    writer.addQuads(graph.getQuads(null, null, null, null));
    writer.end((err, result: string) => (err ? reject(err) : resolve(result)));
  });
}

async function formatResult(result: QueryResult): Promise<string[]> {
  switch (result.type) {
    case 'bindings':
      return formatBindings(result.bindings);
    case 'boolean':
      return [String(result.value)];
    case 'graph':
      return [(await toNTriples(result.graph)).trimEnd()];
  }
}

export function createProgram(deps: CliDeps = {}): Command {
  const write = deps.write ?? ((line: string) => console.log(line));
  const config = loadConfig(deps.env ?? process.env);

  const clientFor = (endpoint: string | undefined, kind: 'query' | 'update', parse: boolean) =>
    new SparqlClient({
      queryEndpoint: kind === 'query' ? endpoint ?? config.queryEndpoint : undefined,
      updateEndpoint: kind === 'update' ? endpoint ?? config.updateEndpoint : undefined,
      parse: parse && config.parse,
      httpConfig: { timeoutMs: config.timeoutMs },
      logger: createConsoleLogger(config.logLevel),
      ...deps.client
    });

  const program = new Command();
  program.name('sparql-wire').description('Send SPARQL queries and updates over the SPARQL Protocol');

  program
    .command('query')
    .description('Run a query and print the response')
    .argument('<sparql>', 'SPARQL query text')
    .option('--endpoint <url>', 'SPARQL query endpoint (default: $SPARQL_ENDPOINT)')
    .option('--format <format>', 'response format alias or MIME type')
    .option('--convert', 'convert the response instead of printing it raw', false)
    .option('--no-parse', 'send without parsing; requires --type')
    .addOption(new Option('--type <type>', 'declared query form').choices(['select', 'ask', 'construct', 'describe']))
    .option('--default-graph-uri <iri>', 'default graph (repeatable)', collect, [])
    .option('--named-graph-uri <iri>', 'named graph (repeatable)', collect, [])
    .option('--version-param <version>', 'protocol version parameter')
    .action(async (sparql: string, opts: QueryCommandOptions) => {
      const client = clientFor(opts.endpoint, 'query', opts.parse);
      const query = typedQuery(sparql, opts.type);
      const options = {
        responseFormat: opts.format,
        version: opts.versionParam,
        defaultGraphUri: optional(opts.defaultGraphUri),
        namedGraphUri: optional(opts.namedGraphUri)
      };
      try {
        if (opts.convert) {
          for (const line of await formatResult(await client.queryConverted(query, options))) write(line);
        } else {
          write(responseText(await client.query(query, options)));
        }
      } finally {
        await client.close();
      }
    });

  program
    .command('update')
    .description('Run an update request')
    .argument('<sparql>', 'SPARQL update text')
    .option('--endpoint <url>', 'SPARQL update endpoint (default: $SPARQL_UPDATE_ENDPOINT)')
    .option('--no-parse', 'send without validating the update syntax')
    .option('--using-graph-uri <iri>', 'using graph (repeatable)', collect, [])
    .option('--using-named-graph-uri <iri>', 'using named graph (repeatable)', collect, [])
    .option('--version-param <version>', 'protocol version parameter')
    .action(async (sparql: string, opts: UpdateCommandOptions) => {
      const client = clientFor(opts.endpoint, 'update', opts.parse);
      try {
        const response = await client.update(sparql, {
          version: opts.versionParam,
          usingGraphUri: optional(opts.usingGraphUri),
          usingNamedGraphUri: optional(opts.usingNamedGraphUri)
        });
        write(`OK: ${response.status} ${response.statusText}`.trimEnd());
      } finally {
        await client.close();
      }
    });

  return program;
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return realpathSync(entry) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  createProgram()
    .parseAsync(process.argv)
    .catch((err) => {
      console.error(err instanceof Error ? err.message : err);
      process.exit(1);
    });
}
