/**
 * Error classes for adaptive-reconnect
 */

// Base error
export { ReconnectKitError, ErrorCode } from './base.js';

// Validation errors
export { ConfigurationError, ValidationError } from './validation.js';

// Reconnection errors
export { ReconnectError, MonitorError } from './reconnect.js';
