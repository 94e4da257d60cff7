// sparql-wire
// SPARQL Protocol client with typed result conversion

export * from './lib/errors.js';
export * from './lib/literals.js';
export * from './lib/converters.js';
export * from './lib/codec.js';
export * from './lib/query.js';
export * from './lib/parameters.js';
export * from './lib/http.js';
export * from './lib/client-manager.js';
export * from './lib/client.js';
export * from './lib/logger.js';
export * from './lib/config.js';
export { shortenIri, valueToDisplay } from './lib/util.js';
