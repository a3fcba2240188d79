export { EntityUnavailableError, type EntityKind } from "./EntityUnavailableError.js";
export { GameCommandInputError } from "./GameCommandInputError.js";
export { GAME_ERROR_KINDS, type GameErrorKind } from "./GameErrorKind.js";
export { InvalidGameStateError } from "./InvalidGameStateError.js";
export { InvalidPlayerStateError } from "./InvalidPlayerStateError.js";
export { InvalidRoundStateError } from "./InvalidRoundStateError.js";
