/**
 * packages/core/src/overlay.ts — Wires the menu, injector and scheduler together.
 *
 * `createOverlay` is the composition root hosts use. It owns the dispatcher
 * that turns a `MenuDispatch` into input: chat and voice-wheel actions go
 * straight to the injector, animations go through the playback scheduler.
 *
 * Every action runs on one queue, so keystroke streams never mix. A new
 * action cancels the running animation and any animation still waiting in
 * the queue, then starts once the actions ahead of it have finished.
 */

import type { AnimationStore } from "./animation/store.js";
import { type InputInjector, createInputInjector } from "./injection/injector.js";
import {
  ANIMATION_LEAD_IN_MS,
  type InjectionProfile,
  QUICK_LEAD_IN_MS,
} from "./injection/protocol.js";
import { type InputBackend, type Sleep, realSleep } from "./injection/types.js";
import { type LogSink, createLogger } from "./log.js";
import { DEFAULT_MENU } from "./menu/defaults.js";
import { buildMenuGraph } from "./menu/graph.js";
import { type MenuStateMachine, createMenuStateMachine } from "./menu/machine.js";
import type { MenuDefinition, MenuDispatch, MenuGraph } from "./menu/types.js";
import { type CancellationToken, createCancellationToken } from "./playback/cancellation.js";
import { type PlaybackScheduler, createPlaybackScheduler } from "./playback/scheduler.js";
import type { TimerHost } from "./timers.js";
import { type MenuView, describeMenu } from "./view.js";

export type OverlayOptions = Readonly<{
  backend: InputBackend;
  store: AnimationStore;
  menu?: MenuDefinition;
  profile?: InjectionProfile;
  screenWidth?: number;
  sleep?: Sleep;
  timers?: TimerHost;
  log?: LogSink;
}>;

export type Overlay = Readonly<{
  graph: MenuGraph;
  machine: MenuStateMachine;
  scheduler: PlaybackScheduler;
  injector: InputInjector;
  store: AnimationStore;
  /** Queue one action; settles once it has run, rejecting with its failure. */
  dispatch: (action: MenuDispatch) => Promise<void>;
  view: () => MenuView | null;
  /** Cancel playback and pending timers, then wait for running work. */
  shutdown: () => Promise<void>;
}>;

/**
 * @throws CommwheelError INVALID_PROPS when the menu definition is inconsistent
 */
export function createOverlay(opts: OverlayOptions): Overlay {
  const sleep = opts.sleep ?? realSleep;
  const log = createLogger(opts.log, "overlay");
  const graph = buildMenuGraph(opts.menu ?? DEFAULT_MENU);
  const injector = createInputInjector({
    backend: opts.backend,
    sleep,
    profile: opts.profile,
    log: opts.log,
  });
  const scheduler = createPlaybackScheduler({
    injector,
    sleep,
    leadInMs: ANIMATION_LEAD_IN_MS,
    screenWidth: opts.screenWidth,
    log: opts.log,
  });

  let tail: Promise<unknown> = Promise.resolve();
  let queuedAnimation: CancellationToken | null = null;

  const stopPlayback = async (): Promise<void> => {
    if (!scheduler.isPlaying()) return;
    log("debug", "stopping the running animation");
    scheduler.cancel();
    await scheduler.whenIdle();
  };

  const run = async (action: MenuDispatch, token: CancellationToken | null): Promise<void> => {
    switch (action.kind) {
      case "free-text":
        await stopPlayback();
        await sleep(QUICK_LEAD_IN_MS);
        await injector.sendFreeText(action.label);
        return;
      case "voice-wheel":
        await stopPlayback();
        await sleep(QUICK_LEAD_IN_MS);
        await injector.triggerVoiceWheel(action.mainIndex, action.subIndex);
        return;
      case "animation": {
        const animation = opts.store.get(action.label);
        if (token?.cancelled === true) {
          log("info", `animation ${action.label} skipped`);
          return;
        }
        const result = await scheduler.play(animation).done;
        log("info", `animation ${action.label} ${result.status}`);
        return;
      }
    }
  };

  const dispatch = (action: MenuDispatch): Promise<void> => {
    queuedAnimation?.cancel();
    queuedAnimation = null;
    if (scheduler.isPlaying()) {
      log("debug", "stopping the running animation");
      scheduler.cancel();
    }

    const token = action.kind === "animation" ? createCancellationToken() : null;
    queuedAnimation = token;
    const done = tail.then(() => run(action, token));
    tail = done.catch(() => undefined);
    return done;
  };

  const machine = createMenuStateMachine({
    graph,
    dispatch,
    timers: opts.timers,
    log: opts.log,
  });

  return Object.freeze({
    graph,
    machine,
    scheduler,
    injector,
    store: opts.store,
    dispatch,
    view: () => describeMenu(machine.state(), graph),
    shutdown: async () => {
      machine.dispose();
      queuedAnimation?.cancel();
      scheduler.cancel();
      await machine.whenIdle();
      await tail;
      await scheduler.whenIdle();
    },
  });
}
