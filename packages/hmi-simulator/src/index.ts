/**
 * hmi-simulator - run multi-page-hmi page trees in a terminal
 */

export {
  ConfigManager,
  SimulatorConfigSchema,
  KeymapSchema,
  DEMO_NAMES,
  type DemoName,
  type SimulatorConfig,
  type SimulatorConfigInput,
} from './config.js';
export { TerminalDisplay, type OutputStream, type TerminalDisplayOptions } from './display/TerminalDisplay.js';
export { KeyboardInput, type KeyboardStream } from './input/KeyboardInput.js';
export { ScriptedInput } from './input/ScriptedInput.js';
export { createKeymap, describeKeymap, describeKey, DEFAULT_KEYS, STOP_KEYS, type Keymap } from './input/keymap.js';
export type { InputEvent, InteractionSource } from './input/types.js';
export { ClockPage, formatTime, type Clock } from './pages/ClockPage.js';
export { HomePage } from './pages/HomePage.js';
export {
  RunLoop,
  type RunLoopEvents,
  type RunLoopOptions,
  type RunSummary,
  type StopReason,
} from './runtime/RunLoop.js';
export { buildDemo, DEMOS, type DemoOptions } from './demos/index.js';
export { createCLI, main, type CliStreams } from './cli/index.js';
