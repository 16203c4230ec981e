/**
 * packages/core/src/menu/machine.ts — Menu navigation state machine.
 *
 * Transitions are synchronous and never wait on input synthesis. A terminal
 * selection hands its action to the dispatcher as a background task, locks
 * the submenu against further selections, and schedules the overlay to hide
 * once the settle delay has passed.
 *
 *   hidden  --toggle-->  root
 *   root    --select(n), option n is a submenu-->  submenu
 *   submenu --select(n)-->  dispatch, lock, hide after settle delay
 *   submenu --back-->  root
 *   root    --back | toggle-->  hidden
 *
 * Back leaves a pending hide in place, so backing out of a submenu that just
 * dispatched still hides the overlay on schedule. Toggle clears it.
 */

import { describeError } from "../errors.js";
import { type LogSink, createLogger } from "../log.js";
import { type TimerHost, realTimers } from "../timers.js";
import type {
  MenuDispatch,
  MenuGraph,
  MenuNode,
  NavigationState,
  SelectOutcome,
} from "./types.js";

/** Hide delay after a voice-wheel selection; covers the native wheel's fade-out. */
export const VOICE_WHEEL_SETTLE_MS = 500;

/** Hide delay after a chat or animation selection. */
export const QUICK_SETTLE_MS = 50;

export type MenuDispatcher = (action: MenuDispatch) => Promise<void>;

export type MenuListener = (state: NavigationState) => void;

export type MenuStateMachineOptions = Readonly<{
  graph: MenuGraph;
  dispatch: MenuDispatcher;
  timers?: TimerHost;
  log?: LogSink;
}>;

export type MenuStateMachine = Readonly<{
  toggle: () => void;
  /** `n` is the 1-based option number. */
  select: (n: number) => SelectOutcome;
  back: () => void;
  state: () => NavigationState;
  isVisible: () => boolean;
  /** Node currently shown, or null when hidden. */
  currentNode: () => MenuNode | null;
  subscribe: (listener: MenuListener) => () => void;
  /** Resolves once every dispatched action has settled. */
  whenIdle: () => Promise<void>;
  /** Cancel a pending auto-hide. */
  dispose: () => void;
}>;

const HIDDEN: NavigationState = Object.freeze({ kind: "hidden" });
const AT_ROOT: NavigationState = Object.freeze({ kind: "root", selectionPending: false });

function toDispatch(node: MenuNode, n: number, label: string): MenuDispatch | null {
  const action = node.action;
  if (action === null) return null;
  switch (action.kind) {
    case "voice-wheel":
      return {
        kind: "voice-wheel",
        submenu: node.name,
        label,
        mainIndex: action.wheelIndex,
        subIndex: n,
      };
    case "animation":
      return { kind: "animation", submenu: node.name, label };
    case "free-text":
      return { kind: "free-text", submenu: node.name, label };
  }
}

export function createMenuStateMachine(opts: MenuStateMachineOptions): MenuStateMachine {
  const graph = opts.graph;
  const timers = opts.timers ?? realTimers;
  const log = createLogger(opts.log, "menu");
  const listeners = new Set<MenuListener>();
  const inFlight = new Set<Promise<void>>();

  let state: NavigationState = HIDDEN;
  let cancelHide: (() => void) | null = null;

  const clearHideTimer = (): void => {
    if (cancelHide !== null) {
      cancelHide();
      cancelHide = null;
    }
  };

  const setState = (next: NavigationState): void => {
    state = next;
    for (const listener of [...listeners]) {
      try {
        listener(next);
      } catch (err) {
        log("error", `menu listener threw: ${describeError(err)}`, err);
      }
    }
  };

  const hide = (): void => {
    clearHideTimer();
    setState(HIDDEN);
  };

  const runDispatch = (action: MenuDispatch): void => {
    const task = new Promise<void>((resolve) => {
      resolve(opts.dispatch(action));
    }).catch((err: unknown) => {
      log("warn", `${action.kind} action "${action.label}" failed: ${describeError(err)}`, err);
    });
    inFlight.add(task);
    void task.finally(() => {
      inFlight.delete(task);
    });
  };

  const toggle = (): void => {
    if (state.kind === "hidden") {
      clearHideTimer();
      setState(AT_ROOT);
      return;
    }
    hide();
  };

  const back = (): void => {
    switch (state.kind) {
      case "submenu":
        setState(AT_ROOT);
        return;
      case "root":
        hide();
        return;
      case "hidden":
        return;
    }
  };

  const select = (n: number): SelectOutcome => {
    const current = state;
    if (current.kind === "hidden") return "ignored-hidden";
    if (current.selectionPending) {
      log("debug", `selection ${String(n)} ignored while an action is pending`);
      return "ignored-pending";
    }

    const node = current.kind === "root" ? graph.root : current.node;
    const label = Number.isInteger(n) && n >= 1 ? node.options[n - 1] : undefined;
    if (label === undefined) {
      log("debug", `selection ${String(n)} is out of range for ${node.name}`);
      return "ignored-range";
    }

    if (current.kind === "root") {
      const submenu = graph.submenu(label);
      if (submenu === undefined) {
        log("debug", `main menu option "${label}" has no submenu`);
        return "ignored-dangling";
      }
      setState(
        Object.freeze({ kind: "submenu", node: submenu, originIndex: n, selectionPending: false }),
      );
      return "navigated";
    }

    const action = toDispatch(node, n, label);
    if (action === null) return "ignored-dangling";
    setState(Object.freeze({ ...current, selectionPending: true }));
    runDispatch(action);

    clearHideTimer();
    const settleMs = action.kind === "voice-wheel" ? VOICE_WHEEL_SETTLE_MS : QUICK_SETTLE_MS;
    cancelHide = timers.set(() => {
      cancelHide = null;
      setState(HIDDEN);
    }, settleMs);
    return "dispatched";
  };

  return Object.freeze({
    toggle,
    select,
    back,
    state: () => state,
    isVisible: () => state.kind !== "hidden",
    currentNode: () => {
      switch (state.kind) {
        case "hidden":
          return null;
        case "root":
          return graph.root;
        case "submenu":
          return state.node;
      }
    },
    subscribe: (listener: MenuListener) => {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
    whenIdle: async () => {
      while (inFlight.size > 0) {
        await Promise.all([...inFlight]);
      }
    },
    dispose: clearHideTimer,
  });
}
