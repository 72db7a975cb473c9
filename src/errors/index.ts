export { DescriptorError, isDescriptorError } from './descriptor.js'
export { InvalidParameterError, isInvalidParameterError } from './invalid-parameter.js'
export { MissingCredentialError, isMissingCredentialError } from './missing-credential.js'
export { MissingParameterError, isMissingParameterError } from './missing-parameter.js'
export { NormalizationError, isNormalizationError } from './normalization.js'
export { PaginationLimitError, isPaginationLimitError } from './pagination-limit.js'
export { ProviderError, getProviderError, isProviderError } from './provider.js'
export { TransportError, getTransportError, isTransportError } from './transport.js'
export type { TransportFailure } from './transport.js'
export { UnknownDatasetError, isUnknownDatasetError } from './unknown-dataset.js'
export { UnknownParameterError, isUnknownParameterError } from './unknown-parameter.js'
export { isErrorType, unwrapErrorType } from './unwrap-error-type.js'
