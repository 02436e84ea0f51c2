/**
 * Scoreboard Layout Engine
 *
 * Pure functions that turn a participant list into the scoreboard geometry.
 * No I/O and no shared state: the same input always yields the same layout.
 *
 * Layout Rules:
 * - Winning team first, losing team second; both teams are always drawn
 * - Team order is by position (TOP, JUNGLE, MIDDLE, BOTTOM, UTILITY, then
 *   unknown) or by kills descending; both sorts are stable
 * - Item bar = packed main items, empty placeholders, trinket, then the
 *   role-bound item when the bar has 6 main slots and the item is present
 * - height = header + Σ(teamHeader + columnHeader + rows × rowHeight)
 *            + teamSpacing + bottomPadding
 */

import { LayoutConfig } from '../config/layout';
import { MatchParticipant, TeamPosition } from '../models/match';
import { ItemCell, LayoutRow, ScoreboardLayout, TeamLayout, TeamSortMode } from '../models/render';

const POSITION_RANK: Record<string, number> = {
  [TeamPosition.TOP]: 0,
  [TeamPosition.JUNGLE]: 1,
  [TeamPosition.MIDDLE]: 2,
  [TeamPosition.BOTTOM]: 3,
  [TeamPosition.UTILITY]: 4,
};

const UNKNOWN_POSITION_RANK = 99;

/**
 * Sort rank of a team position; unknown positions sort last
 */
export function positionRank(position: string): number {
  return POSITION_RANK[position] ?? UNKNOWN_POSITION_RANK;
}

/**
 * Split participants into [winners, losers], keeping input order
 */
export function partitionTeams(
  participants: readonly MatchParticipant[]
): [MatchParticipant[], MatchParticipant[]] {
  const winners = participants.filter((p) => p.win);
  const losers = participants.filter((p) => !p.win);
  return [winners, losers];
}

/**
 * Order a team for display
 *
 * Array.prototype.sort is stable, so ties keep their input order.
 */
export function sortTeam(team: readonly MatchParticipant[], mode: TeamSortMode): MatchParticipant[] {
  const sorted = [...team];
  if (mode === 'kills') {
    sorted.sort((a, b) => b.kills - a.kills);
  } else {
    sorted.sort((a, b) => positionRank(a.teamPosition) - positionRank(b.teamPosition));
  }
  return sorted;
}

/**
 * Main-slot item ids in inventory order, before packing
 *
 * With 7 main slots the role-bound item occupies the extra main slot.
 */
export function mainItemCandidates(participant: MatchParticipant, config: LayoutConfig): number[] {
  const items = participant.items.slice(0, 6);
  return config.mainItemSlots === 7 ? [...items, participant.roleBoundItem] : items;
}

/**
 * Non-empty main item ids, packed to the left
 */
export function packItems(itemIds: readonly number[], slots: number): number[] {
  return itemIds.filter((id) => id > 0).slice(0, slots);
}

/**
 * Build the fixed-width item bar for one participant
 *
 * Produces `mainItemSlots` main cells (packed items, then 0 placeholders),
 * one trinket cell, and a role cell only when it applies.
 */
export function buildItemBar(participant: MatchParticipant, config: LayoutConfig): ItemCell[] {
  const slotWidth = config.itemIconSize + config.itemSpacing;
  const packed = packItems(mainItemCandidates(participant, config), config.mainItemSlots);
  const cells: ItemCell[] = [];

  for (let i = 0; i < config.mainItemSlots; i++) {
    cells.push({
      kind: 'main',
      itemId: i < packed.length ? packed[i] : 0,
      x: config.colItems + i * slotWidth,
    });
  }

  const trinketX = config.colItems + config.mainItemSlots * slotWidth + config.trinketGap;
  cells.push({ kind: 'trinket', itemId: Math.max(participant.trinket, 0), x: trinketX });

  if (config.mainItemSlots === 6 && participant.roleBoundItem > 0) {
    cells.push({ kind: 'role', itemId: participant.roleBoundItem, x: trinketX + slotWidth });
  }

  return cells;
}

/**
 * Height of one team block (banner + column headers + rows)
 */
export function teamBlockHeight(rowCount: number, config: LayoutConfig): number {
  return config.teamHeaderHeight + config.columnHeaderHeight + rowCount * config.rowHeight;
}

/**
 * Total image height for the given team sizes
 */
export function computeImageHeight(teamSizes: readonly number[], config: LayoutConfig): number {
  const teams = teamSizes.reduce((sum, rows) => sum + teamBlockHeight(rows, config), 0);
  return config.headerHeight + teams + config.teamSpacing + config.bottomPadding;
}

/**
 * Compute the complete scoreboard layout
 */
export function computeLayout(
  participants: readonly MatchParticipant[],
  config: LayoutConfig
): ScoreboardLayout {
  const [winners, losers] = partitionTeams(participants);
  const ordered = [sortTeam(winners, config.teamSort), sortTeam(losers, config.teamSort)];

  let y = config.headerHeight;
  const teams: TeamLayout[] = ordered.map((team, index) => {
    if (index > 0) {
      y += config.teamSpacing;
    }
    const bannerY = y;
    const columnHeaderY = bannerY + config.teamHeaderHeight;
    y = columnHeaderY + config.columnHeaderHeight;

    const rows: LayoutRow[] = team.map((participant) => {
      const row: LayoutRow = { participant, y, itemCells: buildItemBar(participant, config) };
      y += config.rowHeight;
      return row;
    });

    return { win: index === 0, bannerY, columnHeaderY, rows };
  });

  return {
    width: config.imageWidth,
    height: computeImageHeight([winners.length, losers.length], config),
    teams: [teams[0], teams[1]],
  };
}
