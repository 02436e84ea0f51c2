/**
 * Match Models
 *
 * Type definitions for the match snapshot handed to the renderer by the
 * match-data provider. Participants are treated as immutable; the renderer
 * never writes to them.
 */

/**
 * Team position reported for a participant
 */
export enum TeamPosition {
  TOP = 'TOP',
  JUNGLE = 'JUNGLE',
  MIDDLE = 'MIDDLE',
  BOTTOM = 'BOTTOM',
  UTILITY = 'UTILITY',
}

/**
 * Tracked account identity
 */
export interface RiotAccount {
  puuid: string;
  gameName: string;
  tagLine: string;
}

/**
 * Per-player snapshot of a finished match
 */
export interface MatchParticipant {
  readonly puuid: string;
  readonly summonerName: string;
  readonly championName: string;
  readonly champLevel: number;
  readonly kills: number;
  readonly deaths: number;
  readonly assists: number;
  readonly totalMinionsKilled: number;
  readonly neutralMinionsKilled: number;
  readonly goldEarned: number;
  readonly totalDamageDealtToChampions: number;
  readonly win: boolean;
  readonly items: readonly number[];   // main inventory, 0 = empty slot
  readonly trinket: number;            // 0 = no trinket
  readonly roleBoundItem: number;      // 0 = none
  readonly teamPosition: string;       // TeamPosition value, or anything else for unknown
}

export interface MatchMetadata {
  matchId: string;
  participants: string[];
}

export interface MatchInfo {
  gameDuration: number;                // seconds
  gameMode: string;
  participants: MatchParticipant[];
}

/**
 * Complete match snapshot
 */
export interface MatchData {
  metadata: MatchMetadata;
  info: MatchInfo;
}

/**
 * Participant as returned by the match-v5 API
 */
export interface ParticipantPayload {
  puuid: string;
  summonerName?: string;
  riotIdGameName?: string;
  championName: string;
  champLevel: number;
  kills: number;
  deaths: number;
  assists: number;
  totalMinionsKilled: number;
  neutralMinionsKilled: number;
  goldEarned: number;
  totalDamageDealtToChampions: number;
  win: boolean;
  item0: number;
  item1: number;
  item2: number;
  item3: number;
  item4: number;
  item5: number;
  item6: number;
  roleBoundItem?: number;
  teamPosition?: string;
}

/**
 * Match as returned by the match-v5 API
 */
export interface MatchPayload {
  metadata: MatchMetadata;
  info: {
    gameDuration: number;
    gameMode: string;
    participants: ParticipantPayload[];
  };
}

/**
 * Convert an API participant payload to a MatchParticipant
 *
 * item0-item5 are the main inventory, item6 is always the trinket.
 */
export function mapParticipantPayload(payload: ParticipantPayload): MatchParticipant {
  const name = payload.riotIdGameName || payload.summonerName || 'Unknown';

  return {
    puuid: payload.puuid,
    summonerName: name,
    championName: payload.championName,
    champLevel: payload.champLevel,
    kills: payload.kills,
    deaths: payload.deaths,
    assists: payload.assists,
    totalMinionsKilled: payload.totalMinionsKilled,
    neutralMinionsKilled: payload.neutralMinionsKilled,
    goldEarned: payload.goldEarned,
    totalDamageDealtToChampions: payload.totalDamageDealtToChampions,
    win: payload.win,
    items: [payload.item0, payload.item1, payload.item2, payload.item3, payload.item4, payload.item5],
    trinket: payload.item6,
    roleBoundItem: payload.roleBoundItem ?? 0,
    teamPosition: payload.teamPosition ?? '',
  };
}
