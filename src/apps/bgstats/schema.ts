import { integer, real, sqliteTable, text } from "drizzle-orm/sqlite-core";

// Core Data store of BG Stats (Documents/Model.sqlite). Core Data prefixes
// entity tables and attribute columns with Z; Z_PK is the row id.

export const zLocation = sqliteTable("ZLOCATION", {
  pk: integer("Z_PK").primaryKey(),
  uuid: text("ZUUID"),
  name: text("ZNAME"),
});

export const zGame = sqliteTable("ZGAME", {
  pk: integer("Z_PK").primaryKey(),
  uuid: text("ZUUID"),
  /** BoardGameGeek id */
  bggId: integer("ZBGGID"),
  name: text("ZNAME"),
});

export const zPlayer = sqliteTable("ZPLAYER", {
  pk: integer("Z_PK").primaryKey(),
  uuid: text("ZUUID"),
  name: text("ZNAME"),
});

export const zPlay = sqliteTable("ZPLAY", {
  pk: integer("Z_PK").primaryKey(),
  uuid: text("ZUUID"),
  /** Seconds since 2001-01-01 UTC */
  playDateTime: real("ZPLAYDATETIME"),
  playedGame: integer("ZPLAYEDGAME"),
  playLocation: integer("ZPLAYLOCATION"),
  board: text("ZBOARD"),
  comments: text("ZCOMMENTS"),
});

export const zPlayerScore = sqliteTable("ZPLAYERSCORE", {
  pk: integer("Z_PK").primaryKey(),
  play: integer("ZPLAY"),
  player: integer("ZPLAYER"),
  win: integer("ZWIN"),
  /** Free text: a number, an arithmetic expression, or empty */
  score: text("ZSCORE"),
  team: integer("ZTEAM"),
});

export const zExpansionPlay = sqliteTable("ZEXPANSIONPLAY", {
  pk: integer("Z_PK").primaryKey(),
  play: integer("ZPLAY"),
  expansionGame: integer("ZEXPANSIONGAME"),
});
