/** Expected failures reported by the facade verbs as tagged results */
export const GAME_ERROR_KINDS = [
  "player_not_found",
  "player_name_taken",
  "game_not_found",
  "player_not_host",
  "player_in_game",
  "invalid_action_for_state",
  "wrong_turn",
  "out_of_range",
] as const;

export type GameErrorKind = (typeof GAME_ERROR_KINDS)[number];
