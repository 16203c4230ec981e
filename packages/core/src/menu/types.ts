/**
 * packages/core/src/menu/types.ts — Menu graph and navigation state.
 */

/**
 * What a terminal selection inside a submenu does. Fixed per submenu at
 * construction time.
 *
 *   - voice-wheel: drive the target's native wheel, `wheelIndex` being the
 *     digit that opens this submenu's page
 *   - animation: play the animation named by the option label
 *   - free-text: paste the option label into chat
 */
export type ActionKind =
  | Readonly<{ kind: "voice-wheel"; wheelIndex: number }>
  | Readonly<{ kind: "animation" }>
  | Readonly<{ kind: "free-text" }>;

export type MenuNode = Readonly<{
  name: string;
  /** Option labels; option `n` is `options[n - 1]`. */
  options: readonly string[];
  /** null for the root. */
  action: ActionKind | null;
}>;

export type MenuGraph = Readonly<{
  root: MenuNode;
  submenu: (name: string) => MenuNode | undefined;
  submenus: ReadonlyMap<string, MenuNode>;
}>;

export type SubmenuDefinition =
  | Readonly<{ action: "voice-wheel"; wheelIndex: number; options: readonly string[] }>
  | Readonly<{ action: "animation" | "free-text"; options: readonly string[] }>;

/** Serializable menu description, as read from a menu file. */
export type MenuDefinition = Readonly<{
  options: readonly string[];
  submenus: Readonly<Record<string, SubmenuDefinition>>;
}>;

/**
 * Navigation state.
 *
 *   - hidden: overlay not shown
 *   - root: main menu shown
 *   - submenu: `node` shown, reached through main-menu option `originIndex`
 */
export type NavigationState =
  | Readonly<{ kind: "hidden" }>
  | Readonly<{ kind: "root"; selectionPending: boolean }>
  | Readonly<{ kind: "submenu"; node: MenuNode; originIndex: number; selectionPending: boolean }>;

/** A terminal action selected in a submenu. */
export type MenuDispatch =
  | Readonly<{
      kind: "voice-wheel";
      submenu: string;
      label: string;
      mainIndex: number;
      subIndex: number;
    }>
  | Readonly<{ kind: "animation"; submenu: string; label: string }>
  | Readonly<{ kind: "free-text"; submenu: string; label: string }>;

/** Why a `select` did or did not act. */
export type SelectOutcome =
  | "ignored-hidden"
  | "ignored-pending"
  | "ignored-range"
  | "ignored-dangling"
  | "navigated"
  | "dispatched";
