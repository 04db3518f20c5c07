/**
 * Component logger on the OpenTelemetry diag channel. Silent unless the host
 * registers a logger with diag.setLogger().
 */

import { diag } from '@opentelemetry/api';

export const LOGGER_NAMESPACE = 'http-entity-recorder';

export const logger = diag.createComponentLogger({ namespace: LOGGER_NAMESPACE });
