/**
 * @commwheel/core
 *
 * Runtime-agnostic core of the commwheel overlay: frame generation, animation
 * store, input-injection protocols, playback scheduling and menu navigation.
 * This package MUST NOT use Node-specific APIs (Buffer, node:* imports).
 */

// =============================================================================
// Errors and logging
// =============================================================================

export {
  CommwheelError,
  type CommwheelErrorCode,
  type CommwheelErrorOptions,
  describeError,
  isCommwheelError,
  safeErr,
} from "./errors.js";
export {
  LOG_LEVEL_RANK,
  type LogEvent,
  type LogLevel,
  type LogSink,
  createLogger,
} from "./log.js";
export { type TimerHost, realTimers } from "./timers.js";

// =============================================================================
// Frames
// =============================================================================

export {
  DEFAULT_BACKGROUND_GLYPH,
  DEFAULT_SCREEN_WIDTH,
  type Frame,
  type ScrollGeometry,
  type Sprite,
  glyphWidth,
} from "./frames/types.js";
export { type ScrollFrames, generateScrollFrames, scrollFrameCount } from "./frames/generator.js";
export { TRUCK_ANIMATION_NAME, TRUCK_SPRITE } from "./frames/sprites.js";
export { WIRE_DELIMITER, formatFramePayload } from "./frames/wire.js";
export {
  type MoveDirection,
  appendFrame,
  frameFromText,
  frameToText,
  moveFrame,
  removeFrame,
  replaceFrame,
} from "./frames/editing.js";

// =============================================================================
// Animations
// =============================================================================

export {
  type Animation,
  type AnimationConfig,
  type AnimationTiming,
  DEFAULT_FRAME_DELAY_MS,
  DEFAULT_SKIP_STRIDE,
  DEFAULT_TIMING,
  type PersistedAnimationConfig,
} from "./animation/types.js";
export {
  defaultAnimationConfig,
  msToSeconds,
  parseAnimationConfig,
  secondsToMs,
  serializeAnimationConfig,
} from "./animation/config.js";
export {
  type AnimationFileData,
  type AnimationFileError,
  type DecodeAnimationFileResult,
  type FrameEdit,
  type PersistedAnimationFile,
  applyFrameEdit,
  decodeAnimationFile,
  encodeAnimationFile,
} from "./animation/file.js";
export {
  type AnimationStore,
  type AnimationStoreOptions,
  type ConfigPersistence,
  createAnimationStore,
} from "./animation/store.js";

// =============================================================================
// Input injection
// =============================================================================

export {
  DIGIT_KEYS,
  type DigitKey,
  type InputBackend,
  type InputKey,
  type InputStep,
  type Sleep,
  isDigitKey,
  realSleep,
} from "./injection/types.js";
export {
  ANIMATION_LEAD_IN_MS,
  DEFAULT_INJECTION_PROFILE,
  type InjectionProfile,
  QUICK_LEAD_IN_MS,
  VOICE_WHEEL_STEP_MS,
  encodeFramePayload,
  encodeFreeText,
  encodeVoiceWheel,
} from "./injection/protocol.js";
export {
  type InputInjector,
  type InputInjectorOptions,
  createInputInjector,
} from "./injection/injector.js";

// =============================================================================
// Playback
// =============================================================================

export { playbackIndices, selectPlaybackFrames } from "./playback/subsequence.js";
export { type CancellationToken, createCancellationToken } from "./playback/cancellation.js";
export {
  type PlaybackEvent,
  type PlaybackHandle,
  type PlaybackListener,
  type PlaybackResult,
  type PlaybackScheduler,
  type PlaybackSchedulerOptions,
  type PlaybackStatus,
  createPlaybackScheduler,
} from "./playback/scheduler.js";

// =============================================================================
// Menu
// =============================================================================

export type {
  ActionKind,
  MenuDefinition,
  MenuDispatch,
  MenuGraph,
  MenuNode,
  NavigationState,
  SelectOutcome,
  SubmenuDefinition,
} from "./menu/types.js";
export { DEFAULT_MENU, ROOT_MENU_NAME } from "./menu/defaults.js";
export {
  type MenuParseError,
  type ParseMenuResult,
  buildMenuGraph,
  parseMenuDefinition,
} from "./menu/graph.js";
export {
  type MenuDispatcher,
  type MenuListener,
  type MenuStateMachine,
  type MenuStateMachineOptions,
  QUICK_SETTLE_MS,
  VOICE_WHEEL_SETTLE_MS,
  createMenuStateMachine,
} from "./menu/machine.js";

// =============================================================================
// Hotkeys, view, composition
// =============================================================================

export type {
  HotkeyListener,
  HotkeyParseError,
  HotkeyRoute,
  HotkeySource,
  Modifiers,
  ParseHotkeyResult,
  ParsedHotkey,
} from "./hotkeys/types.js";
export { NO_MODS, hotkeyToString, hotkeysEqual, parseHotkey } from "./hotkeys/parser.js";
export {
  DEFAULT_BACK_KEY,
  DEFAULT_TOGGLE_KEY,
  type HotkeyBridge,
  type HotkeyBridgeOptions,
  createHotkeyBridge,
} from "./hotkeys/bridge.js";
export { type MenuRow, type MenuView, ROOT_HEADER, describeMenu, renderMenuLines } from "./view.js";
export { type Overlay, type OverlayOptions, createOverlay } from "./overlay.js";
