export type {
	OutputFormat,
	ParameterValue,
	ParameterValues,
	CanonicalRecord,
	RequestSpec,
	RawResponse,
	ColumnType,
	Column,
	Cell,
	Table,
	CallOptions,
} from './types.js'

export type {
	ParameterType,
	ParameterLocation,
	ParameterSpec,
	ResponseShape,
	Pagination,
	PaginationMode,
	ColumnSpec,
	EndpointDescriptor,
	EndpointInput,
} from './core/descriptor.js'
export type { ConnectionOptions, RequestContext } from './core/context.js'
export type { Transport, FetchFn, FetchTransportOptions } from './core/transport.js'
export type { Engine } from './core/engine.js'
export type { Logger } from './core/log.js'
export type { PdsConfig } from './core/config.js'
export type { CatalogInput } from './catalog/loader.js'
export type { Accessors, RecordAccessor, TableAccessor } from './catalog/registry.js'

export { PremiumClient, type ClientOptions } from './client.js'
export { defineEndpoint, pathSlots, CREDENTIAL_PARAM } from './core/descriptor.js'
export { buildRequest, formatDate, redactUrl } from './core/request-builder.js'
export { FetchTransport } from './core/transport.js'
export { normalize } from './core/normalizer.js'
export { toTable, inferColumnType, parseTemporal, columnValues, tableToRecords } from './core/tabularizer.js'
export { fetchRecords, fetchTable, DEFAULT_MAX_PAGES } from './core/engine.js'
export { resolveContext, resolveBaseUrl, CLOUD_URL, SANDBOX_URL, DEFAULT_TIMEOUT_MS } from './core/context.js'
export { createLogger } from './core/log.js'
export { loadCatalog, premiumDatasets } from './catalog/loader.js'
export { buildAccessors, tableAccessorName } from './catalog/registry.js'
export { loadConfig, saveConfig, getConfigPath } from './core/config.js'
export * as formatter from './core/formatter.js'
export * from './errors/index.js'
