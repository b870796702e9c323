/**
 * Built-in pages rendering to a TextDisplay
 */

export { BasicPage } from './BasicPage.js';
export { TextPage } from './TextPage.js';
export { StartupPage } from './StartupPage.js';
export { ShutdownPage } from './ShutdownPage.js';
export { MenuPage } from './MenuPage.js';
export { EnterStringPage, type EnterStringLabels } from './EnterStringPage.js';
