/**
 * Core module exports
 */

export {
  Interaction,
  PageNavigation,
  ok,
  err,
  type PageNavigationType,
  type RunState,
  type Result,
  type Ok,
  type Err,
  type TextDisplay,
} from './types.js';

export { HmiError, PageError, ConfigurationError, SettingError, ErrorCodes, type ErrorCode } from './errors.js';

export { PageLifetime, tickLifetime } from './lifetime.js';

export { dispatchPage, updatePage, pageTitle, type Page, type PageTitles } from './page.js';

export { defaultNavigation, navigationEquals, isMovement, describeNavigation } from './navigation.js';

export {
  PageManager,
  createPageManager,
  DIRECTIONS,
  type Direction,
  type PageManagerEvents,
  type PageManagerOptions,
} from './PageManager.js';
