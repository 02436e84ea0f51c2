/**
 * Render Models
 *
 * Types produced by the layout engine and consumed by the renderer.
 */

import { MatchParticipant } from './match';

/**
 * Rule used to order players within a team
 */
export type TeamSortMode = 'position' | 'kills';

/**
 * Number of main inventory cells drawn per row
 */
export type MainItemSlots = 6 | 7;

/**
 * One cell of a player's item bar
 *
 * `itemId` is 0 for an empty placeholder.
 */
export interface ItemCell {
  kind: 'main' | 'trinket' | 'role';
  itemId: number;
  x: number;
}

/**
 * A participant with its row position and packed item bar
 */
export interface LayoutRow {
  participant: MatchParticipant;
  y: number;
  itemCells: ItemCell[];
}

export interface TeamLayout {
  win: boolean;
  bannerY: number;
  columnHeaderY: number;
  rows: LayoutRow[];
}

/**
 * Full scoreboard layout, winning team first
 */
export interface ScoreboardLayout {
  width: number;
  height: number;
  teams: [TeamLayout, TeamLayout];
}

/**
 * Resolved local icon paths for one participant, null when unavailable
 */
export interface PlayerAssets {
  puuid: string;
  championPath: string | null;
  mainItemPaths: Array<string | null>;   // packed, one per non-empty main item
  trinketPath: string | null;
  roleItemPath: string | null;
}

/**
 * Options accepted by a single render call
 */
export interface RenderOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
  jobId?: string;   // correlates logs with the caller's request; generated when absent
}
