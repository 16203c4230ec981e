/**
 * packages/core/src/view.ts — Menu view model.
 *
 * Rendering is a host concern; this module only decides what is shown.
 */

import type { MenuGraph, NavigationState } from "./menu/types.js";

export const ROOT_HEADER = "COMMUNICATION";

export type MenuRow = Readonly<{ n: number; label: string }>;

export type MenuView = Readonly<{
  header: string;
  rows: readonly MenuRow[];
  /** Label of the back/escape action. */
  footer: "Close" | "Back";
  selectionPending: boolean;
}>;

/** null while the overlay is hidden. */
export function describeMenu(state: NavigationState, graph: MenuGraph): MenuView | null {
  if (state.kind === "hidden") return null;
  const atRoot = state.kind === "root";
  const node = atRoot ? graph.root : state.node;
  return Object.freeze({
    header: atRoot ? ROOT_HEADER : node.name.toUpperCase(),
    rows: Object.freeze(node.options.map((label, i) => Object.freeze({ n: i + 1, label }))),
    footer: atRoot ? "Close" : "Back",
    selectionPending: state.selectionPending,
  });
}

export function renderMenuLines(view: MenuView): readonly string[] {
  return Object.freeze([
    view.header,
    ...view.rows.map((row) => `  ${String(row.n)}  ${row.label}`),
    `  Esc  ${view.footer}`,
  ]);
}
