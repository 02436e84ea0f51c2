/**
 * Scoreboard Layout Configuration
 *
 * Pixel geometry of the scoreboard image. Mirrors the in-game post-game
 * screen: header, then one banner + column header + rows block per team.
 */

import { MainItemSlots, TeamSortMode } from '../models/render';

export interface LayoutConfig {
  imageWidth: number;
  headerHeight: number;
  teamHeaderHeight: number;
  columnHeaderHeight: number;
  rowHeight: number;
  teamSpacing: number;
  bottomPadding: number;

  // Column x positions
  colChampIcon: number;
  colName: number;
  colItems: number;
  colKda: number;
  colCs: number;
  colGold: number;
  colDamage: number;

  // Icon sizes
  champIconSize: number;
  itemIconSize: number;
  itemSpacing: number;
  trinketGap: number;
  levelBadgeSize: number;

  mainItemSlots: MainItemSlots;
  teamSort: TeamSortMode;
}

export const DEFAULT_LAYOUT: LayoutConfig = {
  imageWidth: 750,
  headerHeight: 80,
  teamHeaderHeight: 32,
  columnHeaderHeight: 22,
  rowHeight: 44,
  teamSpacing: 12,
  bottomPadding: 16,

  colChampIcon: 8,
  colName: 56,
  colItems: 170,
  colKda: 420,
  colCs: 510,
  colGold: 570,
  colDamage: 655,

  champIconSize: 32,
  itemIconSize: 24,
  itemSpacing: 2,
  trinketGap: 5,
  levelBadgeSize: 14,

  mainItemSlots: 6,
  teamSort: 'position',
};

/**
 * Build a layout from the defaults with selected overrides
 */
export function createLayoutConfig(overrides: Partial<LayoutConfig> = {}): LayoutConfig {
  return { ...DEFAULT_LAYOUT, ...overrides };
}
