/**
 * Scoreboard text formatting
 *
 * Every string drawn on a scoreboard row or header comes from here.
 */

import { MatchParticipant } from '../models/match';

const MAX_NAME_LENGTH = 12;
const TRUNCATED_NAME_LENGTH = 10;

/**
 * Shorten names longer than 12 characters to 10 characters plus ".."
 */
export function truncateName(name: string): string {
  return name.length > MAX_NAME_LENGTH ? `${name.slice(0, TRUNCATED_NAME_LENGTH)}..` : name;
}

/**
 * Format gold and damage: 15432 -> "15.4k", 850 -> "850"
 *
 * Thousands are rounded at single precision, so 1050 -> "1.0k" and 12350 -> "12.4k".
 */
export function formatLargeNumber(value: number): string {
  return value >= 1000 ? `${Math.fround(value / 1000).toFixed(1)}k` : String(value);
}

export function formatKda(participant: Pick<MatchParticipant, 'kills' | 'deaths' | 'assists'>): string {
  return `${participant.kills} / ${participant.deaths} / ${participant.assists}`;
}

/**
 * Total creep score (lane minions + jungle monsters)
 */
export function formatCreepScore(
  participant: Pick<MatchParticipant, 'totalMinionsKilled' | 'neutralMinionsKilled'>
): string {
  return String(participant.totalMinionsKilled + participant.neutralMinionsKilled);
}

/**
 * Header subtitle, e.g. "CLASSIC • 31:05"
 */
export function formatGameInfo(gameMode: string, gameDurationSeconds: number): string {
  const minutes = Math.floor(gameDurationSeconds / 60);
  const seconds = Math.floor(gameDurationSeconds % 60);
  return `${gameMode} • ${minutes}:${String(seconds).padStart(2, '0')}`;
}
