/**
 * Core domain typedefs used throughout the game.
 * Player names double as player identities; game identifiers are allocated
 * by the game registry.
 */

/** Unique name of a player on the server */
export type PlayerName = string;

/** Unique identifier of a hosted game */
export type GameId = string;

/** Zero-based round counter inside a game */
export type RoundNumber = number;

/** Absolute time point in milliseconds since Unix epoch */
export type TimePoint = number;

/** Game state machine status */
export type GameStatus = "setting_up" | "in_play" | "ended";

/** Role of a roster member inside a game */
export type GameRole = "host" | "player";
