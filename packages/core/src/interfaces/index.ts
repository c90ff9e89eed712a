export type { ConnectorConfig, ConnectionState, ISourceConnector } from './connector.js';
