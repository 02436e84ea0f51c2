/**
 * Match fixtures shared by the layout and renderer tests
 */

import { MatchData, MatchParticipant, RiotAccount } from '../../src/models/match';

const POSITIONS = ['TOP', 'JUNGLE', 'MIDDLE', 'BOTTOM', 'UTILITY'];

export function createParticipant(overrides: Partial<MatchParticipant> = {}): MatchParticipant {
  return {
    puuid: 'puuid-0',
    summonerName: 'Player0',
    championName: 'Ahri',
    champLevel: 16,
    kills: 5,
    deaths: 3,
    assists: 7,
    totalMinionsKilled: 180,
    neutralMinionsKilled: 12,
    goldEarned: 12500,
    totalDamageDealtToChampions: 21000,
    win: true,
    items: [1001, 3020, 0, 0, 0, 0],
    trinket: 3340,
    roleBoundItem: 0,
    teamPosition: 'MIDDLE',
    ...overrides,
  };
}

/**
 * Ten players: puuid-0..4 win, puuid-5..9 lose, one per position each side
 */
export function createTeams(): MatchParticipant[] {
  return Array.from({ length: 10 }, (_, i) =>
    createParticipant({
      puuid: `puuid-${i}`,
      summonerName: `Player${i}`,
      championName: i % 2 === 0 ? 'Ahri' : 'Garen',
      win: i < 5,
      kills: i,
      teamPosition: POSITIONS[i % 5],
    })
  );
}

export function createMatch(participants: MatchParticipant[] = createTeams()): MatchData {
  return {
    metadata: {
      matchId: 'EUW1_1000',
      participants: participants.map((p) => p.puuid),
    },
    info: {
      gameDuration: 1865,
      gameMode: 'CLASSIC',
      participants,
    },
  };
}

export function createAccount(puuid = 'puuid-0'): RiotAccount {
  return { puuid, gameName: 'Tracked', tagLine: 'EUW' };
}
