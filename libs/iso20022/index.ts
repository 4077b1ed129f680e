export * from './schema/constraints.js';
export * from './schema/types.js';
export * from './schema/leaves.js';
export * from './schema/composites.js';
export * from './validation/propagator.js';
export * from './wire/wireElement.js';
export * from './wire/decoder.js';
export * from './wire/encoder.js';
export * from './wire/xmlAdapter.js';
export * from './document/catalog.js';
export * from './document/envelope.js';
export * from './document/businessMessage.js';
export * from './messages/index.js';
export * from './codec.js';
export * from '../errors/bindingErrors.js';
export { ErrorSanitizer, InternalBindingError, type ErrorReport } from '../errors/sanitizer.js';
export { loadBindingConfig, type BindingConfig } from '../config/bindingConfig.js';
