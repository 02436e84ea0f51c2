/**
 * Match Validation Module
 *
 * Validates raw match-v5 payloads using ajv and converts them to MatchData.
 * Only the fields the scoreboard draws are checked; every other field the
 * API returns is allowed through and ignored.
 */

import Ajv, { JSONSchemaType, ErrorObject } from 'ajv';
import { MatchData, MatchPayload, ParticipantPayload, mapParticipantPayload } from '../models/match';
import { ValidationError } from '../models/errors';

const ajv = new Ajv({
  allErrors: true,
  strict: true,
  coerceTypes: false,
});

const count = { type: 'integer', minimum: 0 } as const;
const itemId = { type: 'integer', minimum: 0 } as const;

const participantSchema: JSONSchemaType<ParticipantPayload> = {
  type: 'object',
  properties: {
    puuid: { type: 'string', minLength: 1 },
    summonerName: { type: 'string', nullable: true },
    riotIdGameName: { type: 'string', nullable: true },
    championName: { type: 'string', minLength: 1 },
    champLevel: { type: 'integer', minimum: 1 },
    kills: count,
    deaths: count,
    assists: count,
    totalMinionsKilled: count,
    neutralMinionsKilled: count,
    goldEarned: count,
    totalDamageDealtToChampions: count,
    win: { type: 'boolean' },
    item0: itemId,
    item1: itemId,
    item2: itemId,
    item3: itemId,
    item4: itemId,
    item5: itemId,
    item6: itemId,
    roleBoundItem: { type: 'integer', minimum: 0, nullable: true },
    teamPosition: { type: 'string', nullable: true },
  },
  required: [
    'puuid',
    'championName',
    'champLevel',
    'kills',
    'deaths',
    'assists',
    'totalMinionsKilled',
    'neutralMinionsKilled',
    'goldEarned',
    'totalDamageDealtToChampions',
    'win',
    'item0',
    'item1',
    'item2',
    'item3',
    'item4',
    'item5',
    'item6',
  ],
  additionalProperties: true,
};

const matchSchema: JSONSchemaType<MatchPayload> = {
  type: 'object',
  properties: {
    metadata: {
      type: 'object',
      properties: {
        matchId: { type: 'string', minLength: 1 },
        participants: { type: 'array', items: { type: 'string' } },
      },
      required: ['matchId', 'participants'],
      additionalProperties: true,
    },
    info: {
      type: 'object',
      properties: {
        gameDuration: { type: 'number', minimum: 0 },
        gameMode: { type: 'string' },
        participants: { type: 'array', items: participantSchema, minItems: 1 },
      },
      required: ['gameDuration', 'gameMode', 'participants'],
      additionalProperties: true,
    },
  },
  required: ['metadata', 'info'],
  additionalProperties: true,
};

const validateMatchPayload = ajv.compile(matchSchema);

/**
 * Format ajv errors into field-specific error messages
 */
function formatValidationErrors(errors: ErrorObject[]): Array<{ field: string; message: string }> {
  return errors.map((error) => {
    const base = error.instancePath.replace(/^\//, '').replace(/\//g, '.');
    const missing =
      error.keyword === 'required' && typeof error.params.missingProperty === 'string'
        ? error.params.missingProperty
        : undefined;
    const field = missing ? (base ? `${base}.${missing}` : missing) : base || 'match';

    return {
      field,
      message: error.message || 'is invalid',
    };
  });
}

/**
 * Validate a raw match payload and convert it to MatchData
 *
 * @throws ValidationError with per-field details if the payload is malformed
 */
export function parseMatchData(raw: unknown): MatchData {
  if (!validateMatchPayload(raw)) {
    const details = formatValidationErrors(validateMatchPayload.errors || []);
    throw new ValidationError('Invalid match payload', details);
  }

  return {
    metadata: {
      matchId: raw.metadata.matchId,
      participants: [...raw.metadata.participants],
    },
    info: {
      gameDuration: raw.info.gameDuration,
      gameMode: raw.info.gameMode,
      participants: raw.info.participants.map(mapParticipantPayload),
    },
  };
}
