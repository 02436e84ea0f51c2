/**
 * Scoreboard Renderer
 *
 * Renders a post-game scoreboard PNG for a tracked account: header with the
 * result, then both teams with icon, level, name, item bar, KDA, CS, gold and
 * damage per player.
 *
 * Each render runs under one deadline that covers waiting for a render slot,
 * downloading icons and drawing. Only `concurrency` renders compose at a time;
 * the rest wait for a slot until their deadline and then fail with
 * AdmissionTimeoutError without having drawn anything.
 */

import { setMaxListeners } from 'events';
import { promises as fs } from 'fs';
import { createCanvas, GlobalFonts, Image, loadImage, SKRSContext2D } from '@napi-rs/canvas';
import { v4 as uuidv4 } from 'uuid';
import { MAX_TIMER_MS } from '../config/environment';
import { LayoutConfig } from '../config/layout';
import { IconProvider } from '../models/asset';
import { AdmissionTimeoutError, CancellationError, InputError } from '../models/errors';
import { MatchData, MatchParticipant, RiotAccount } from '../models/match';
import { ItemCell, LayoutRow, PlayerAssets, RenderOptions, ScoreboardLayout } from '../models/render';
import {
  formatCreepScore,
  formatGameInfo,
  formatKda,
  formatLargeNumber,
  truncateName,
} from '../utils/format';
import { computeLayout } from '../utils/layout-engine';
import { log, logRender, LogLevel } from '../utils/logger';
import { emitAdmissionTimeout, emitInBackground, emitRenderDuration } from '../utils/metrics';
import { ReleaseSlot, RenderQueue } from './render-queue';

export interface RendererOptions {
  concurrency: number;
  timeoutMs: number;
  layout: LayoutConfig;
  headingFontPath?: string;
  statsFontPath?: string;
}

/**
 * In-flight render: deadline plus the abort signal shared by every step
 */
interface RenderJob {
  id: string;
  signal: AbortSignal;
  startedAt: number;
  dispose: () => void;
}

type IconImages = Map<string, Image | null>;

const HEADING_FONT_ALIAS = 'Scoreboard Heading';
const STATS_FONT_ALIAS = 'Scoreboard Stats';
const FALLBACK_FONT = 'sans-serif';

const COLORS = {
  background: 'rgb(10, 20, 25)',
  victory: [70, 130, 180],
  defeat: [180, 70, 70],
  subtitle: 'rgb(140, 140, 140)',
  columnHeader: 'rgb(100, 100, 100)',
  trackedWinRow: 'rgb(35, 55, 75)',
  trackedLossRow: 'rgb(65, 40, 45)',
  winRow: 'rgb(22, 32, 42)',
  lossRow: 'rgb(38, 28, 33)',
  trackedText: 'rgb(255, 215, 0)',
  text: 'rgb(255, 255, 255)',
  mutedText: 'rgb(160, 160, 160)',
  gold: 'rgb(200, 170, 90)',
  damage: 'rgb(200, 100, 100)',
  levelBadge: 'rgba(0, 0, 0, 0.8)',
  levelText: 'rgb(200, 200, 200)',
  missingIcon: 'rgb(30, 35, 40)',
  brokenChampionIcon: 'rgb(50, 50, 50)',
  brokenItemIcon: 'rgb(60, 30, 30)',
  emptySlotFill: 'rgb(18, 22, 28)',
  emptySlotBorder: 'rgb(30, 35, 40)',
} as const;

function rgb([r, g, b]: readonly number[], alpha = 1): string {
  return alpha === 1 ? `rgb(${r}, ${g}, ${b})` : `rgba(${r}, ${g}, ${b}, ${alpha})`;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function cancellationFrom(signal: AbortSignal): CancellationError {
  return signal.reason instanceof CancellationError
    ? signal.reason
    : new CancellationError('Render cancelled');
}

function throwIfAborted(signal: AbortSignal): void {
  if (signal.aborted) {
    throw cancellationFrom(signal);
  }
}

function emptyAssets(puuid: string): PlayerAssets {
  return { puuid, championPath: null, mainItemPaths: [], trinketPath: null, roleItemPath: null };
}

function registerFont(fontPath: string | undefined, alias: string): string {
  if (fontPath && GlobalFonts.registerFromPath(fontPath, alias)) {
    return `"${alias}"`;
  }
  if (fontPath) {
    log(LogLevel.WARN, 'Failed to load font, using fallback', { font_path: fontPath });
  }
  return FALLBACK_FONT;
}

export class ScoreboardRenderer {
  private readonly queue: RenderQueue;
  private readonly headingFamily: string;
  private readonly statsFamily: string;

  constructor(private imageCache: IconProvider, private options: RendererOptions) {
    this.queue = new RenderQueue(options.concurrency);
    this.headingFamily = registerFont(options.headingFontPath, HEADING_FONT_ALIAS);
    this.statsFamily = registerFont(options.statsFontPath, STATS_FONT_ALIAS);
  }

  get activeRenders(): number {
    return this.queue.active;
  }

  get waitingRenders(): number {
    return this.queue.waiting;
  }

  /**
   * Render the scoreboard for the match as PNG bytes
   *
   * @throws InputError if the account did not play in the match
   * @throws AdmissionTimeoutError if no render slot freed up before the deadline
   * @throws CancellationError if the deadline or the caller's signal fired after admission
   */
  async renderSummary(
    account: RiotAccount,
    matchData: MatchData,
    options: RenderOptions = {}
  ): Promise<Buffer> {
    const participants = matchData.info.participants;
    const matchId = matchData.metadata.matchId;
    const job = this.createJob(options);

    try {
      const tracked = participants.find((p) => p.puuid === account.puuid);
      if (!tracked) {
        throw new InputError(`Player not found in match ${matchId}`);
      }

      const release = await this.admit(job);
      let png: Buffer;
      try {
        png = await this.renderAdmitted(account, tracked, matchData, job);
      } finally {
        release();
      }

      const durationMs = Date.now() - job.startedAt;
      logRender({ jobId: job.id, matchId, participantCount: participants.length, outcome: 'SUCCESS', durationMs });
      emitInBackground(emitRenderDuration(durationMs, 'success'));
      return png;
    } catch (error) {
      this.recordFailure(error, job, matchId, participants.length);
      throw error;
    } finally {
      job.dispose();
    }
  }

  private createJob(options: RenderOptions): RenderJob {
    const timeoutMs = Math.min(options.timeoutMs ?? this.options.timeoutMs, MAX_TIMER_MS);
    const controller = new AbortController();
    // Every icon lookup of the render listens on this signal.
    setMaxListeners(0, controller.signal);
    const external = options.signal;

    const timer = setTimeout(() => {
      controller.abort(new CancellationError(`Render timed out after ${timeoutMs}ms`, true));
    }, timeoutMs);

    const onExternalAbort = () => {
      controller.abort(new CancellationError('Render cancelled by caller'));
    };
    if (external?.aborted) {
      onExternalAbort();
    } else {
      external?.addEventListener('abort', onExternalAbort, { once: true });
    }

    return {
      id: options.jobId ?? uuidv4(),
      signal: controller.signal,
      startedAt: Date.now(),
      dispose: () => {
        clearTimeout(timer);
        external?.removeEventListener('abort', onExternalAbort);
      },
    };
  }

  /**
   * Wait for a render slot; the deadline expiring here is an admission timeout
   */
  private async admit(job: RenderJob): Promise<ReleaseSlot> {
    try {
      return await this.queue.acquire(job.signal);
    } catch (error) {
      if (error instanceof CancellationError && error.timedOut) {
        throw new AdmissionTimeoutError(
          'Render queue is full. Please try again later.',
          Date.now() - job.startedAt
        );
      }
      throw error;
    }
  }

  private recordFailure(error: unknown, job: RenderJob, matchId: string, participantCount: number): void {
    const durationMs = Date.now() - job.startedAt;
    const base = { jobId: job.id, matchId, participantCount, durationMs, errorMessage: errorMessage(error) };

    if (error instanceof InputError) {
      logRender({ ...base, outcome: 'INPUT_ERROR' });
    } else if (error instanceof AdmissionTimeoutError) {
      logRender({ ...base, outcome: 'ADMISSION_TIMEOUT' });
      emitInBackground(emitAdmissionTimeout());
    } else if (error instanceof CancellationError) {
      logRender({ ...base, outcome: 'CANCELLED' });
      emitInBackground(emitRenderDuration(durationMs, error.timedOut ? 'timeout' : 'cancelled'));
    } else {
      logRender({ ...base, outcome: 'FAILED' });
      emitInBackground(emitRenderDuration(durationMs, 'error'));
    }
  }

  private async renderAdmitted(
    account: RiotAccount,
    tracked: MatchParticipant,
    matchData: MatchData,
    job: RenderJob
  ): Promise<Buffer> {
    throwIfAborted(job.signal);

    const layout = computeLayout(matchData.info.participants, this.options.layout);
    const assets = await this.loadAllPlayerAssets(layout, job.signal);
    throwIfAborted(job.signal);

    const icons = await this.decodeIcons(assets);
    throwIfAborted(job.signal);

    const canvas = createCanvas(layout.width, layout.height);
    const ctx = canvas.getContext('2d');
    ctx.textBaseline = 'top';

    this.drawBackground(ctx, layout);
    this.drawHeader(ctx, tracked, matchData);

    for (const team of layout.teams) {
      const color = team.win ? COLORS.victory : COLORS.defeat;
      this.drawTeamHeader(ctx, team.win ? 'VICTORY' : 'DEFEAT', color, team.bannerY, layout.width);
      this.drawTableHeaders(ctx, team.columnHeaderY);

      for (const row of team.rows) {
        const playerAssets = assets.get(row.participant.puuid) ?? emptyAssets(row.participant.puuid);
        const isTracked = row.participant.puuid === account.puuid;
        this.drawPlayerRow(ctx, row, playerAssets, icons, isTracked, team.win, layout.width);
      }
    }

    const png = await canvas.encode('png');
    throwIfAborted(job.signal);

    log(LogLevel.DEBUG, 'Rendered match summary', {
      job_id: job.id,
      player_count: matchData.info.participants.length,
      height: layout.height,
    });
    return png;
  }

  /**
   * Resolve icon paths for every player in parallel
   *
   * All tasks are joined before returning. A task that fails for any reason
   * other than cancellation gets placeholder assets; a cancellation is
   * rethrown once every sibling has settled.
   */
  private async loadAllPlayerAssets(
    layout: ScoreboardLayout,
    signal: AbortSignal
  ): Promise<Map<string, PlayerAssets>> {
    const rows = layout.teams.flatMap((team) => team.rows);
    const results = await Promise.allSettled(rows.map((row) => this.loadPlayerAssets(row, signal)));

    const assets = new Map<string, PlayerAssets>();
    let cancellation: CancellationError | undefined;

    results.forEach((result, index) => {
      const puuid = rows[index].participant.puuid;
      if (result.status === 'fulfilled') {
        assets.set(puuid, result.value);
      } else if (result.reason instanceof CancellationError) {
        cancellation = cancellation ?? result.reason;
      } else {
        log(LogLevel.WARN, 'Failed to load player assets, using placeholders', {
          puuid,
          error: errorMessage(result.reason),
        });
        assets.set(puuid, emptyAssets(puuid));
      }
    });

    if (cancellation) {
      throw cancellation;
    }
    return assets;
  }

  private async loadPlayerAssets(row: LayoutRow, signal: AbortSignal): Promise<PlayerAssets> {
    const { participant, itemCells } = row;
    const mainIds = itemCells.filter((c) => c.kind === 'main' && c.itemId > 0).map((c) => c.itemId);
    const trinketId = itemCells.find((c) => c.kind === 'trinket')?.itemId ?? 0;
    const roleId = itemCells.find((c) => c.kind === 'role')?.itemId ?? 0;

    const [championPath, mainItemPaths, trinketPath, roleItemPath] = await Promise.all([
      this.imageCache.getChampionIcon(participant.championName, signal),
      Promise.all(mainIds.map((id) => this.imageCache.getItemIcon(id, signal))),
      this.imageCache.getItemIcon(trinketId, signal),
      this.imageCache.getItemIcon(roleId, signal),
    ]);

    return { puuid: participant.puuid, championPath, mainItemPaths, trinketPath, roleItemPath };
  }

  /**
   * Decode each distinct icon file once; undecodable files map to null
   */
  private async decodeIcons(assets: Map<string, PlayerAssets>): Promise<IconImages> {
    const paths = new Set<string>();
    for (const a of assets.values()) {
      for (const p of [a.championPath, ...a.mainItemPaths, a.trinketPath, a.roleItemPath]) {
        if (p) paths.add(p);
      }
    }

    const images: IconImages = new Map();
    await Promise.all(
      [...paths].map(async (iconPath) => {
        try {
          images.set(iconPath, await loadImage(await fs.readFile(iconPath)));
        } catch (error) {
          log(LogLevel.WARN, 'Failed to decode icon, drawing placeholder', {
            path: iconPath,
            error: errorMessage(error),
          });
          images.set(iconPath, null);
        }
      })
    );
    return images;
  }

  // ── Drawing helpers ────────────────────────────────────────────────

  private font(family: string, size: number): string {
    return `bold ${size}px ${family}`;
  }

  private drawBackground(ctx: SKRSContext2D, layout: ScoreboardLayout): void {
    ctx.fillStyle = COLORS.background;
    ctx.fillRect(0, 0, layout.width, layout.height);
  }

  private drawHeader(ctx: SKRSContext2D, tracked: MatchParticipant, matchData: MatchData): void {
    ctx.font = this.font(this.headingFamily, 28);
    ctx.fillStyle = rgb(tracked.win ? COLORS.victory : COLORS.defeat);
    ctx.fillText(tracked.win ? 'VICTORY' : 'DEFEAT', 16, 12);

    ctx.font = this.font(this.statsFamily, 13);
    ctx.fillStyle = COLORS.subtitle;
    ctx.fillText(formatGameInfo(matchData.info.gameMode, matchData.info.gameDuration), 16, 48);
  }

  private drawTeamHeader(
    ctx: SKRSContext2D,
    teamName: string,
    color: readonly number[],
    y: number,
    width: number
  ): void {
    const { teamHeaderHeight } = this.options.layout;
    ctx.fillStyle = rgb(color, 0.15);
    ctx.fillRect(0, y, width, teamHeaderHeight);

    ctx.font = this.font(this.statsFamily, 13);
    ctx.fillStyle = rgb(color);
    ctx.fillText(teamName, 10, y + 9);
  }

  private drawTableHeaders(ctx: SKRSContext2D, y: number): void {
    const l = this.options.layout;
    ctx.font = this.font(this.statsFamily, 10);
    ctx.fillStyle = COLORS.columnHeader;

    const headers: Array<[string, number]> = [
      ['CHAMPION', l.colChampIcon],
      ['ITEMS', l.colItems],
      ['KDA', l.colKda],
      ['CS', l.colCs],
      ['GOLD', l.colGold],
      ['DMG', l.colDamage],
    ];
    for (const [label, x] of headers) {
      ctx.fillText(label, x, y + 5);
    }
  }

  private drawPlayerRow(
    ctx: SKRSContext2D,
    row: LayoutRow,
    assets: PlayerAssets,
    icons: IconImages,
    isTracked: boolean,
    isWinningTeam: boolean,
    width: number
  ): void {
    const l = this.options.layout;
    const { participant: player, y } = row;

    if (isTracked) {
      ctx.fillStyle = isWinningTeam ? COLORS.trackedWinRow : COLORS.trackedLossRow;
    } else {
      ctx.fillStyle = isWinningTeam ? COLORS.winRow : COLORS.lossRow;
    }
    ctx.fillRect(0, y, width, l.rowHeight);

    const textColor = isTracked ? COLORS.trackedText : COLORS.text;
    const textY = y + 15;
    const iconY = Math.floor(y + (l.rowHeight - l.champIconSize) / 2);

    this.drawIcon(ctx, icons, assets.championPath, l.colChampIcon, iconY, l.champIconSize, COLORS.brokenChampionIcon);
    this.drawLevelBadge(ctx, player.champLevel, l.colChampIcon, iconY + l.champIconSize - 12);

    ctx.font = this.font(this.statsFamily, 12);
    ctx.fillStyle = textColor;
    ctx.fillText(truncateName(player.summonerName), l.colName, textY);

    this.drawItems(ctx, icons, row.itemCells, assets, y + (l.rowHeight - l.itemIconSize) / 2);

    ctx.font = this.font(this.statsFamily, 12);
    ctx.fillStyle = textColor;
    ctx.fillText(formatKda(player), l.colKda, textY);

    ctx.fillStyle = COLORS.mutedText;
    ctx.fillText(formatCreepScore(player), l.colCs, textY);

    ctx.fillStyle = COLORS.gold;
    ctx.fillText(formatLargeNumber(player.goldEarned), l.colGold, textY);

    ctx.fillStyle = COLORS.damage;
    ctx.fillText(formatLargeNumber(player.totalDamageDealtToChampions), l.colDamage, textY);
  }

  /**
   * Level badge at the bottom-left corner of the champion icon
   */
  private drawLevelBadge(ctx: SKRSContext2D, level: number, x: number, y: number): void {
    const size = this.options.layout.levelBadgeSize;
    ctx.fillStyle = COLORS.levelBadge;
    ctx.fillRect(x, y, size, size);

    const label = String(level);
    ctx.font = this.font(this.statsFamily, 10);
    const textWidth = ctx.measureText(label).width;
    ctx.fillStyle = COLORS.levelText;
    ctx.fillText(label, x + (size - textWidth) / 2, y + 1);
  }

  /**
   * Draw the packed item bar
   *
   * Non-empty main cells take the packed paths in order; empty main cells and
   * a missing trinket are drawn as empty slots; the role cell only exists when
   * the player has a role-bound item.
   */
  private drawItems(
    ctx: SKRSContext2D,
    icons: IconImages,
    cells: ItemCell[],
    assets: PlayerAssets,
    y: number
  ): void {
    const size = this.options.layout.itemIconSize;
    let packedIndex = 0;

    for (const cell of cells) {
      if (cell.itemId === 0) {
        this.drawEmptyItemSlot(ctx, cell.x, y);
        continue;
      }

      let iconPath: string | null;
      if (cell.kind === 'main') {
        iconPath = assets.mainItemPaths[packedIndex] ?? null;
        packedIndex++;
      } else if (cell.kind === 'trinket') {
        iconPath = assets.trinketPath;
      } else {
        iconPath = assets.roleItemPath;
      }

      this.drawIcon(ctx, icons, iconPath, cell.x, y, size, COLORS.brokenItemIcon);
    }
  }

  /**
   * Draw one icon; a missing or undecodable icon becomes a solid tile
   */
  private drawIcon(
    ctx: SKRSContext2D,
    icons: IconImages,
    iconPath: string | null,
    x: number,
    y: number,
    size: number,
    brokenColor: string
  ): void {
    const image = iconPath ? icons.get(iconPath) : undefined;
    if (image) {
      ctx.drawImage(image, x, y, size, size);
      return;
    }
    ctx.fillStyle = iconPath ? brokenColor : COLORS.missingIcon;
    ctx.fillRect(x, y, size, size);
  }

  private drawEmptyItemSlot(ctx: SKRSContext2D, x: number, y: number): void {
    const size = this.options.layout.itemIconSize;
    ctx.fillStyle = COLORS.emptySlotFill;
    ctx.fillRect(x, y, size, size);
    ctx.strokeStyle = COLORS.emptySlotBorder;
    ctx.lineWidth = 1;
    ctx.strokeRect(x, y, size, size);
  }
}
