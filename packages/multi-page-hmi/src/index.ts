/**
 * multi-page-hmi - page navigation for displays with a handful of buttons
 *
 * @example
 * ```typescript
 * import { PageManager, TextPage, BasicPage, Interaction } from 'multi-page-hmi';
 *
 * const manager = new PageManager(display, new TextPage(new BasicPage('Home'), 'Welcome'));
 * manager.register(new TextPage(new BasicPage('Info'), 'v1.0'));
 * manager.dispatchInteraction(Interaction.Next);
 * ```
 */

export * from './core/index.js';
export * from './pages/index.js';
export { CellSetting, numberSetting, stringSetting, type Setting } from './setting/CellSetting.js';
export {
  createLogger,
  LoggingConfigSchema,
  LOG_LEVELS,
  type Logger,
  type LoggerOptions,
  type LoggingConfig,
  type LogLevel,
} from './utils/logger.js';
