/**
 * @fileoverview Registers core application services with the DI container:
 * the parsed configuration and the logger.
 * @module src/container/registrations/core
 */
import { container } from 'tsyringe';

import { parseConfig } from '../../config/index.js';
import { logger } from '../../utils/internal/logger.js';
import { AppConfig, Logger } from '../tokens.js';

/**
 * Registers core application services and values with the tsyringe container.
 */
export const registerCoreServices = () => {
  // Configuration (parsed and registered as a static value)
  const config = parseConfig();
  container.register(AppConfig, { useValue: config });

  // Logger (as a static value)
  container.register(Logger, { useValue: logger });

  logger.info('Core services registered with the DI container.');
};
