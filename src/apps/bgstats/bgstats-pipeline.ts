import { eq, sql } from "drizzle-orm";
import { drizzle } from "drizzle-orm/better-sqlite3";
import { alias } from "drizzle-orm/sqlite-core";
import type { Backup } from "../../backup/backup.js";
import { cocoaSecondsToDate } from "../../backup/cocoa-time.js";
import { logger } from "../../config/logger.js";
import type { Pipeline } from "../../runner/types.js";
import { zExpansionPlay, zGame, zLocation, zPlay, zPlayer, zPlayerScore } from "./schema.js";
import { evaluateScoreExpression, ScoreExpressionError } from "./score-expression.js";

export const BGSTATS_BUNDLE_ID = "nl.vissering.BoardGameStats";
export const BGSTATS_DATABASE = "Documents/Model.sqlite";

/** Fullwidth solidus used to join board, comments and expansion names. */
const SEPARATOR = "／";

export type Score = number | string | null;

export interface PlayerResult {
  name: string | null;
  winner: boolean;
  score: Score;
  team?: number;
}

export interface FullPlay {
  id: number;
  uuid: string | null;
  /** ISO timestamp of the play */
  date: string | null;
  game: string | null;
  location: string | null;
  comments: string;
  expansions: string | null;
  players: PlayerResult[];
}

export interface BoardGameStats {
  locations: Array<{ id: number; uuid: string | null; name: string | null }>;
  games: Array<{ id: number; uuid: string | null; bggId: number | null; name: string | null }>;
  players: Array<{ id: number; uuid: string | null; name: string | null }>;
  plays: Array<{
    id: number;
    uuid: string | null;
    date: number | null;
    gameId: number | null;
    locationId: number | null;
    comments: string;
  }>;
  scores: Array<{
    id: number;
    playId: number | null;
    playerId: number | null;
    winner: number | null;
    score: string | null;
    team: number | null;
  }>;
  expansionPlays: Array<{ id: number; playId: number | null; gameId: number | null }>;
  playsFull: FullPlay[];
}

/**
 * Numeric value of a score cell. Empty cells count as 0; text that is not
 * arithmetic is kept verbatim.
 */
export function normalizeScore(raw: string | null): Score {
  if (raw === null) return null;
  if (raw.trim() === "") return 0;
  try {
    return evaluateScoreExpression(raw);
  } catch (err) {
    if (!(err instanceof ScoreExpressionError)) throw err;
    logger.warn(`Keeping non-numeric score "${raw}"`, { err: err.message });
    return raw;
  }
}

function joinedComments() {
  return sql<string>`trim(coalesce(${zPlay.board}, '') || ${SEPARATOR} || coalesce(${zPlay.comments}, ''), ${SEPARATOR})`;
}

export function extractBoardGameStats(backup: Backup): BoardGameStats {
  const app = backup.application(BGSTATS_BUNDLE_ID);
  const sqlite = backup.openDatabase(app.file(BGSTATS_DATABASE));
  try {
    const db = drizzle(sqlite);

    const locations = db
      .select({ id: zLocation.pk, uuid: zLocation.uuid, name: zLocation.name })
      .from(zLocation)
      .orderBy(zLocation.pk)
      .all();
    const games = db
      .select({ id: zGame.pk, uuid: zGame.uuid, bggId: zGame.bggId, name: zGame.name })
      .from(zGame)
      .orderBy(zGame.pk)
      .all();
    const players = db
      .select({ id: zPlayer.pk, uuid: zPlayer.uuid, name: zPlayer.name })
      .from(zPlayer)
      .orderBy(zPlayer.pk)
      .all();
    const plays = db
      .select({
        id: zPlay.pk,
        uuid: zPlay.uuid,
        date: zPlay.playDateTime,
        gameId: zPlay.playedGame,
        locationId: zPlay.playLocation,
        comments: joinedComments(),
      })
      .from(zPlay)
      .orderBy(zPlay.pk)
      .all();
    const scores = db
      .select({
        id: zPlayerScore.pk,
        playId: zPlayerScore.play,
        playerId: zPlayerScore.player,
        winner: zPlayerScore.win,
        score: zPlayerScore.score,
        team: zPlayerScore.team,
      })
      .from(zPlayerScore)
      .orderBy(zPlayerScore.pk)
      .all();
    const expansionPlays = db
      .select({ id: zExpansionPlay.pk, playId: zExpansionPlay.play, gameId: zExpansionPlay.expansionGame })
      .from(zExpansionPlay)
      .orderBy(zExpansionPlay.pk)
      .all();

    const expansionGame = alias(zGame, "expansion_game");
    const fullRows = db
      .select({
        id: zPlay.pk,
        uuid: zPlay.uuid,
        date: zPlay.playDateTime,
        game: zGame.name,
        location: zLocation.name,
        comments: joinedComments(),
        expansions: sql<string | null>`group_concat(${expansionGame.name}, ${SEPARATOR})`,
      })
      .from(zPlay)
      .leftJoin(zGame, eq(zPlay.playedGame, zGame.pk))
      .leftJoin(zLocation, eq(zPlay.playLocation, zLocation.pk))
      .leftJoin(zExpansionPlay, eq(zExpansionPlay.play, zPlay.pk))
      .leftJoin(expansionGame, eq(zExpansionPlay.expansionGame, expansionGame.pk))
      .groupBy(zPlay.pk)
      .orderBy(zPlay.pk)
      .all();

    const playsFull = new Map<number, FullPlay>();
    for (const row of fullRows) {
      playsFull.set(row.id, {
        ...row,
        date: row.date === null ? null : cocoaSecondsToDate(row.date).toISOString(),
        players: [],
      });
    }

    const results = db
      .select({
        playId: zPlayerScore.play,
        name: zPlayer.name,
        win: zPlayerScore.win,
        score: zPlayerScore.score,
        team: zPlayerScore.team,
      })
      .from(zPlayerScore)
      .leftJoin(zPlayer, eq(zPlayerScore.player, zPlayer.pk))
      .orderBy(zPlayerScore.pk)
      .all();

    for (const { playId, name, win, score, team } of results) {
      const play = playId === null ? undefined : playsFull.get(playId);
      if (!play) {
        logger.warn("Score row references a missing play", { playId });
        continue;
      }
      play.players.push({
        name,
        winner: Boolean(win),
        score: normalizeScore(score),
        ...(team === null ? {} : { team }),
      });
    }

    return {
      locations,
      games,
      players,
      plays,
      scores,
      expansionPlays,
      playsFull: [...playsFull.values()],
    };
  } finally {
    sqlite.close();
  }
}

export function createBoardGameStatsPipeline(): Pipeline {
  return {
    name: "bgstats",
    async run({ backup, output }) {
      const stats = extractBoardGameStats(backup);
      await output.writeRecords("BGStats/locations.json", stats.locations);
      await output.writeRecords("BGStats/games.json", stats.games);
      await output.writeRecords("BGStats/players.json", stats.players);
      await output.writeRecords("BGStats/plays.json", stats.plays);
      await output.writeRecords("BGStats/scores.json", stats.scores);
      await output.writeRecords("BGStats/plays-expansion.json", stats.expansionPlays);
      await output.writeRecords("BGStats/plays-full.json", stats.playsFull);
      logger.info(`Extracted ${stats.playsFull.length} plays`, { backup: backup.id });
    },
  };
}
