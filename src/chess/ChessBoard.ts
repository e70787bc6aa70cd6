/**
 * ChessBoard - the rules engine
 *
 * Owns the live pieces, the capture lists, the move history and the current
 * en-passant target. Generates pseudo-legal moves per piece kind, filters them
 * by simulating each move and testing for check, and applies or undoes moves
 * including castling, en passant and promotion.
 *
 * The board is turn-agnostic: it answers for either color at any time and
 * leaves turn order to the caller.
 */

import { z } from 'zod';
import { createLogger } from '../core/EngineLogger.js';
import {
  InvalidDestinationError,
  InvalidPromotionChoiceError,
  MissingPromotionChoiceError,
  PieceNotFoundError,
} from './errors.js';
import { createMoveRecord } from './MoveRecord.js';
import { Piece, opposite } from './Piece.js';
import { assertSquare, isInBounds, sameSquare, square, squareIndex, toSquareName } from './squares.js';
import {
  BACK_RANK,
  COLORS,
  DEFAULT_BOARD_CONFIG,
  DISPLAY_ORDER,
  PIECE_LETTERS,
  PIECE_VALUES,
  PROMOTION_KINDS,
  type BoardConfig,
  type BoardSnapshot,
  type CapturedPieces,
  type Color,
  type GameOutcome,
  type MoveRecord,
  type PieceKind,
  type PieceMove,
  type PieceSnapshot,
  type PromotionKind,
  type Square,
} from './types.js';

const log = createLogger('Board');

/** Validates a {@link BoardConfig} and fills in defaults */
export const BoardConfigSchema = z.object({
  verbose: z.boolean().default(DEFAULT_BOARD_CONFIG.verbose),
  defaultPromotion: z
    .enum(['queen', 'rook', 'bishop', 'knight'])
    .nullable()
    .default(DEFAULT_BOARD_CONFIG.defaultPromotion),
});

type Offset = readonly [number, number];

const KNIGHT_OFFSETS: readonly Offset[] = [
  [2, 1], [2, -1], [-2, 1], [-2, -1],
  [1, 2], [1, -2], [-1, 2], [-1, -2],
];

const KING_OFFSETS: readonly Offset[] = [
  [-1, -1], [-1, 0], [-1, 1],
  [0, -1], [0, 1],
  [1, -1], [1, 0], [1, 1],
];

const ROOK_DIRECTIONS: readonly Offset[] = [[0, 1], [0, -1], [1, 0], [-1, 0]];
const BISHOP_DIRECTIONS: readonly Offset[] = [[1, 1], [1, -1], [-1, 1], [-1, -1]];
const QUEEN_DIRECTIONS: readonly Offset[] = [...ROOK_DIRECTIONS, ...BISHOP_DIRECTIONS];

/** +1 for White, -1 for Black */
function pawnDirection(color: Color): number {
  return color === 'white' ? 1 : -1;
}

function pawnHomeRank(color: Color): number {
  return color === 'white' ? 1 : 6;
}

function promotionRank(color: Color): number {
  return color === 'white' ? 7 : 0;
}

function isPromotionKind(kind: PieceKind): kind is PromotionKind {
  return PROMOTION_KINDS.some((k) => k === kind);
}

function assertNever(value: never): never {
  throw new Error(`Unhandled piece kind: ${String(value)}`);
}

interface CastlingPlan {
  rook: Piece;
  rookFrom: Square;
  rookTo: Square;
}

/**
 * ChessBoard holds one game's position and history
 */
export class ChessBoard {
  private config: Required<BoardConfig>;
  private pieces: Piece[] = [];
  /** Square index -> piece, kept in step with `pieces` */
  private occupancy: Array<Piece | null> = new Array<Piece | null>(64).fill(null);
  private capturedPieces: CapturedPieces = { white: [], black: [] };
  private moveHistory: MoveRecord[] = [];
  /** Live-list index of each move's captured piece, parallel to moveHistory */
  private captureSlots: number[] = [];
  private enPassantTarget: Square | null = null;

  constructor(config: BoardConfig = {}) {
    this.config = BoardConfigSchema.parse(config);
    this.setupInitialPosition();
  }

  // ===========================================================================
  // Setup
  // ===========================================================================

  /**
   * Restore the starting position, discarding captures, history and the
   * en-passant target
   */
  reset(): void {
    this.capturedPieces = { white: [], black: [] };
    this.moveHistory = [];
    this.captureSlots = [];
    this.enPassantTarget = null;
    this.setupInitialPosition();

    if (this.config.verbose) {
      log.info('Board reset to starting position');
    }
  }

  private setupInitialPosition(): void {
    this.pieces = [];
    let nextId = 1;

    for (const color of COLORS) {
      const backRank = color === 'white' ? 0 : 7;
      BACK_RANK.forEach((kind, file) => {
        this.pieces.push(new Piece(nextId++, kind, color, square(file, backRank)));
      });
      for (let file = 0; file < 8; file++) {
        this.pieces.push(new Piece(nextId++, 'pawn', color, square(file, pawnHomeRank(color))));
      }
    }

    this.occupancy.fill(null);
    for (const piece of this.pieces) {
      this.occupancy[squareIndex(piece.square)] = piece;
    }
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  /** Piece standing on a square, or null */
  pieceAt(sq: Square): Piece | null {
    assertSquare(sq);
    return this.occupancy[squareIndex(sq)] ?? null;
  }

  /** Live pieces of one color, in board order */
  piecesOf(color: Color): Piece[] {
    return this.pieces.filter((p) => p.color === color);
  }

  /** All live pieces, in board order */
  getPieces(): Piece[] {
    return [...this.pieces];
  }

  kingOf(color: Color): Piece | null {
    return this.pieces.find((p) => p.color === color && p.isKing()) ?? null;
  }

  getEnPassantTarget(): Square | null {
    return this.enPassantTarget;
  }

  /** Detailed move history, oldest first */
  getHistory(): MoveRecord[] {
    return [...this.moveHistory];
  }

  /** Move history as notation strings */
  history(): string[] {
    return this.moveHistory.map((m) => m.notation);
  }

  getLastMove(): MoveRecord | null {
    return this.moveHistory.length > 0
      ? this.moveHistory[this.moveHistory.length - 1]
      : null;
  }

  /** Captured pieces, keyed by capturing color, in capture order */
  getCapturedPieces(): CapturedPieces {
    return {
      white: [...this.capturedPieces.white],
      black: [...this.capturedPieces.black],
    };
  }

  /**
   * Material on the board for a color, in centipawns (kings count zero)
   */
  getMaterialCount(color: Color): number {
    return this.piecesOf(color).reduce((sum, p) => sum + PIECE_VALUES[p.kind], 0);
  }

  // ===========================================================================
  // Move Generation
  // ===========================================================================

  /**
   * Squares the piece can reach by its movement rule, ignoring whether the
   * move would leave its own king in check
   */
  pseudoLegalMoves(piece: Piece): Square[] {
    this.assertLive(piece);
    return this.generatePseudoLegal(piece);
  }

  /**
   * Pseudo-legal moves that do not leave the mover's king in check
   */
  legalMoves(piece: Piece): Square[] {
    this.assertLive(piece);
    return this.generatePseudoLegal(piece).filter((to) => this.leavesKingSafe(piece, to));
  }

  /**
   * Whether moving the piece to `to` is pseudo-legal and keeps its king safe
   */
  isMoveLegal(piece: Piece, to: Square): boolean {
    this.assertLive(piece);
    assertSquare(to);
    return this.generatePseudoLegal(piece).some((sq) => sameSquare(sq, to))
      && this.leavesKingSafe(piece, to);
  }

  /** Every legal move for one color */
  allLegalMoves(color: Color): PieceMove[] {
    const moves: PieceMove[] = [];
    for (const piece of this.piecesOf(color)) {
      for (const to of this.legalMoves(piece)) {
        moves.push({ piece, to });
      }
    }
    return moves;
  }

  hasLegalMoves(color: Color): boolean {
    return this.piecesOf(color).some((piece) =>
      this.generatePseudoLegal(piece).some((to) => this.leavesKingSafe(piece, to)),
    );
  }

  /**
   * Whether moving the piece to `to` is legal and would promote it.
   * Lets a caller ask for a promotion choice before calling applyMove.
   */
  isPromotionMove(piece: Piece, to: Square): boolean {
    this.assertLive(piece);
    return piece.isPawn() && to.rank === promotionRank(piece.color) && this.isMoveLegal(piece, to);
  }

  private generatePseudoLegal(piece: Piece): Square[] {
    switch (piece.kind) {
      case 'pawn':
        return this.pawnMoves(piece);
      case 'knight':
        return this.stepMoves(piece, KNIGHT_OFFSETS);
      case 'bishop':
        return this.slidingMoves(piece, BISHOP_DIRECTIONS);
      case 'rook':
        return this.slidingMoves(piece, ROOK_DIRECTIONS);
      case 'queen':
        return this.slidingMoves(piece, QUEEN_DIRECTIONS);
      case 'king':
        return [...this.stepMoves(piece, KING_OFFSETS), ...this.castlingMoves(piece)];
      default:
        return assertNever(piece.kind);
    }
  }

  private pawnMoves(pawn: Piece): Square[] {
    const moves: Square[] = [];
    const { file, rank } = pawn.square;
    const dir = pawnDirection(pawn.color);
    const ahead = rank + dir;

    if (isInBounds(file, ahead) && !this.occupant(file, ahead)) {
      moves.push(square(file, ahead));

      const twoAhead = rank + 2 * dir;
      if (rank === pawnHomeRank(pawn.color) && !this.occupant(file, twoAhead)) {
        moves.push(square(file, twoAhead));
      }
    }

    for (const df of [-1, 1]) {
      if (!isInBounds(file + df, ahead)) continue;
      const target = square(file + df, ahead);
      const occupant = this.occupant(target.file, target.rank);
      if (occupant) {
        if (occupant.color !== pawn.color) moves.push(target);
      } else if (this.enPassantVictim(pawn, target)) {
        moves.push(target);
      }
    }

    return moves;
  }

  private stepMoves(piece: Piece, offsets: readonly Offset[]): Square[] {
    const moves: Square[] = [];
    for (const [df, dr] of offsets) {
      const file = piece.square.file + df;
      const rank = piece.square.rank + dr;
      if (!isInBounds(file, rank)) continue;
      const occupant = this.occupant(file, rank);
      if (!occupant || occupant.color !== piece.color) {
        moves.push(square(file, rank));
      }
    }
    return moves;
  }

  private slidingMoves(piece: Piece, directions: readonly Offset[]): Square[] {
    const moves: Square[] = [];
    for (const [df, dr] of directions) {
      let file = piece.square.file + df;
      let rank = piece.square.rank + dr;
      while (isInBounds(file, rank)) {
        const occupant = this.occupant(file, rank);
        if (occupant) {
          if (occupant.color !== piece.color) moves.push(square(file, rank));
          break;
        }
        moves.push(square(file, rank));
        file += df;
        rank += dr;
      }
    }
    return moves;
  }

  /**
   * Castling destinations for an unmoved king. The king moves two files
   * toward an unmoved rook on the a- or h-file; every square between them
   * must be empty, and neither the king's square nor the square it crosses
   * may be attacked. The landing square is left to the legality filter.
   */
  private castlingMoves(king: Piece): Square[] {
    if (king.hasMoved || this.isInCheck(king.color)) return [];

    const moves: Square[] = [];
    const { file, rank } = king.square;
    const enemy = king.opposite();

    for (const side of [1, -1]) {
      const rookFile = side > 0 ? 7 : 0;
      const rook = this.occupant(rookFile, rank);
      if (!rook || !rook.isRook() || rook.color !== king.color || rook.hasMoved) continue;
      if (!this.isPathClear(file, rookFile, rank)) continue;

      const destination = square(file + 2 * side, rank);
      if (!isInBounds(destination.file, rank) || Math.abs(rookFile - file) < 3) continue;
      if (this.isSquareAttacked(square(file + side, rank), enemy)) continue;

      moves.push(destination);
    }

    return moves;
  }

  /** True when every square strictly between the two files is empty */
  private isPathClear(fromFile: number, toFile: number, rank: number): boolean {
    const step = Math.sign(toFile - fromFile);
    for (let f = fromFile + step; f !== toFile; f += step) {
      if (this.occupant(f, rank)) return false;
    }
    return true;
  }

  /**
   * The enemy pawn a pawn would take by moving to `to` en passant, or null
   */
  private enPassantVictim(pawn: Piece, to: Square): Piece | null {
    if (!pawn.isPawn() || !sameSquare(to, this.enPassantTarget)) return null;
    if (Math.abs(to.file - pawn.square.file) !== 1) return null;
    const victim = this.occupant(to.file, to.rank - pawnDirection(pawn.color));
    return victim && victim.isPawn() && victim.color !== pawn.color ? victim : null;
  }

  // ===========================================================================
  // Check Detection
  // ===========================================================================

  /**
   * Whether any piece of `byColor` attacks the square
   */
  isSquareAttacked(sq: Square, byColor: Color): boolean {
    assertSquare(sq);
    return this.pieces.some((p) => p.color === byColor && this.attacks(p, sq));
  }

  /**
   * Pawns and kings are tested directly: pawns attack only diagonally, and
   * going through king move generation would recurse into castling.
   */
  private attacks(attacker: Piece, target: Square): boolean {
    const df = target.file - attacker.square.file;
    const dr = target.rank - attacker.square.rank;

    if (attacker.isPawn()) {
      return dr === pawnDirection(attacker.color) && Math.abs(df) === 1;
    }
    if (attacker.isKing()) {
      return Math.max(Math.abs(df), Math.abs(dr)) === 1;
    }
    return this.generatePseudoLegal(attacker).some((sq) => sameSquare(sq, target));
  }

  /**
   * Whether the color's king is attacked. False when the color has no king.
   */
  isInCheck(color: Color): boolean {
    const king = this.kingOf(color);
    if (!king) return false;
    return this.isSquareAttacked(king.square, opposite(color));
  }

  isCheckmate(color: Color): boolean {
    return this.isInCheck(color) && !this.hasLegalMoves(color);
  }

  isStalemate(color: Color): boolean {
    return !this.isInCheck(color) && !this.hasLegalMoves(color);
  }

  /**
   * Checkmate or stalemate for the side to move, or null while play goes on
   */
  getOutcome(color: Color): GameOutcome | null {
    if (this.hasLegalMoves(color)) return null;
    return this.isInCheck(color) ? 'checkmate' : 'stalemate';
  }

  // ===========================================================================
  // Simulation
  // ===========================================================================

  private leavesKingSafe(piece: Piece, to: Square): boolean {
    return !this.withSimulatedMove(piece, to, () => this.isInCheck(piece.color));
  }

  /**
   * Run `query` with the piece provisionally moved to `to` and any captured
   * piece removed. The position, including the order of the piece list, is
   * restored on every exit path.
   */
  private withSimulatedMove<T>(piece: Piece, to: Square, query: () => T): T {
    const origin = piece.square;
    const victim = this.enPassantVictim(piece, to) ?? this.occupant(to.file, to.rank);
    const victimSlot = victim ? this.detach(victim) : -1;

    this.relocate(piece, to);
    try {
      return query();
    } finally {
      this.relocate(piece, origin);
      if (victim) this.attach(victim, victimSlot);
    }
  }

  // ===========================================================================
  // Core Game Methods
  // ===========================================================================

  /**
   * Apply a legal move.
   * @param promotionKind - Required when a pawn reaches the last rank, unless
   *   the board was configured with a `defaultPromotion`
   * @returns The immutable record appended to history
   * @throws InvalidDestinationError if `to` is not among the piece's legal moves
   * @throws MissingPromotionChoiceError / InvalidPromotionChoiceError for a
   *   promotion without a usable choice
   */
  applyMove(piece: Piece, to: Square, promotionKind?: PieceKind): MoveRecord {
    this.assertLive(piece);
    assertSquare(to);

    if (!this.legalMoves(piece).some((sq) => sameSquare(sq, to))) {
      log.warn(`Rejected move: ${piece} to ${toSquareName(to)}`);
      throw new InvalidDestinationError(piece.toString(), to);
    }

    const promotion = this.resolvePromotion(piece, to, promotionKind);
    const from = piece.square;
    const pieceKind = piece.kind;
    const isCastling = piece.isKing() && Math.abs(to.file - from.file) === 2;
    const castling = isCastling ? this.planCastling(piece, to) : null;

    let captured: Piece | null = null;
    let capturedSquare: Square | null = null;
    let captureSlot = -1;

    // En passant: the victim stands behind the destination
    const epVictim = this.enPassantVictim(piece, to);
    if (epVictim) {
      captured = epVictim;
      capturedSquare = epVictim.square;
      captureSlot = this.detach(epVictim);
    }

    if (castling) {
      this.relocate(castling.rook, castling.rookTo);
      castling.rook.setMoved(true);
    }

    if (!epVictim) {
      const target = this.occupant(to.file, to.rank);
      if (target && target.color !== piece.color) {
        captured = target;
        capturedSquare = to;
        captureSlot = this.detach(target);
      }
    }

    if (captured) {
      this.capturedPieces[piece.color].push(captured);
    }

    this.enPassantTarget = piece.isPawn() && Math.abs(to.rank - from.rank) === 2
      ? square(from.file, from.rank + pawnDirection(piece.color))
      : null;

    this.relocate(piece, square(to.file, to.rank));
    piece.setMoved(true);

    if (promotion) {
      piece.setKind(promotion);
    }

    const record = createMoveRecord({
      piece,
      pieceKind,
      color: piece.color,
      from,
      to: square(to.file, to.rank),
      captured,
      capturedSquare,
      isCastling,
      isEnPassant: epVictim !== null,
      isPromotion: promotion !== null,
      promotionKind: promotion,
      castlingRook: castling?.rook ?? null,
      rookFrom: castling?.rookFrom ?? null,
      rookTo: castling?.rookTo ?? null,
    });

    this.moveHistory.push(record);
    this.captureSlots.push(captureSlot);

    if (this.config.verbose) {
      log.info(`Applied ${record.notation} (${record.color})`);
    }

    return record;
  }

  /**
   * Undo the last move
   * @returns The undone move, or null if there is no history
   */
  undoLastMove(): MoveRecord | null {
    const record = this.moveHistory.pop();
    if (!record) return null;
    const captureSlot = this.captureSlots.pop() ?? -1;

    const { piece } = record;
    this.relocate(piece, record.from);
    piece.setKind(record.pieceKind);
    piece.setMoved(this.hasMovedInHistory(piece));

    if (record.captured) {
      const list = this.capturedPieces[record.color];
      const idx = list.lastIndexOf(record.captured);
      if (idx !== -1) list.splice(idx, 1);
      this.attach(record.captured, captureSlot >= 0 ? captureSlot : this.pieces.length);
    }

    if (record.castlingRook && record.rookFrom) {
      this.relocate(record.castlingRook, record.rookFrom);
      record.castlingRook.setMoved(this.hasMovedInHistory(record.castlingRook));
    }

    this.enPassantTarget = this.deriveEnPassantTarget();

    if (this.config.verbose) {
      log.info(`Undid ${record.notation} (${record.color})`);
    }

    return record;
  }

  private resolvePromotion(piece: Piece, to: Square, requested?: PieceKind): PromotionKind | null {
    if (!piece.isPawn() || to.rank !== promotionRank(piece.color)) return null;

    const choice = requested ?? this.config.defaultPromotion;
    if (!choice) {
      log.warn(`Rejected move: ${piece} to ${toSquareName(to)} needs a promotion choice`);
      throw new MissingPromotionChoiceError(piece.toString(), to);
    }
    if (!isPromotionKind(choice)) {
      log.warn(`Rejected move: ${piece} cannot promote to ${choice}`);
      throw new InvalidPromotionChoiceError(choice);
    }
    return choice;
  }

  private planCastling(king: Piece, to: Square): CastlingPlan {
    const side = Math.sign(to.file - king.square.file);
    const rookFrom = square(side > 0 ? 7 : 0, king.square.rank);
    const rook = this.occupant(rookFrom.file, rookFrom.rank);
    if (!rook || !rook.isRook()) {
      throw new PieceNotFoundError(`castling rook at ${toSquareName(rookFrom)}`);
    }
    return { rook, rookFrom, rookTo: square(king.square.file + side, king.square.rank) };
  }

  /** A piece has moved if any remaining record moved it, castling rooks included */
  private hasMovedInHistory(piece: Piece): boolean {
    return this.moveHistory.some((m) => m.piece === piece || m.castlingRook === piece);
  }

  /** Re-derive the en-passant target from the last remaining record */
  private deriveEnPassantTarget(): Square | null {
    const last = this.getLastMove();
    if (!last || last.pieceKind !== 'pawn' || Math.abs(last.to.rank - last.from.rank) !== 2) {
      return null;
    }
    return square(last.from.file, last.from.rank + pawnDirection(last.color));
  }

  // ===========================================================================
  // State Export
  // ===========================================================================

  /**
   * Text diagram, rank 8 at the top. White pieces are uppercase, Black
   * lowercase, empty squares are dots.
   */
  ascii(): string {
    const lines: string[] = [];
    for (let rank = 7; rank >= 0; rank--) {
      const cells: string[] = [];
      for (let file = 0; file < 8; file++) {
        const piece = this.occupant(file, rank);
        if (!piece) {
          cells.push('.');
        } else {
          const letter = PIECE_LETTERS[piece.kind];
          cells.push(piece.color === 'white' ? letter : letter.toLowerCase());
        }
      }
      lines.push(`${rank + 1} ${cells.join(' ')}`);
    }
    lines.push('  a b c d e f g h');
    return lines.join('\n');
  }

  /**
   * JSON-safe view of the position for a presentation layer
   */
  getState(): BoardSnapshot {
    return {
      pieces: this.pieces.map(toPieceSnapshot),
      captured: {
        white: this.capturedPieces.white.map(toPieceSnapshot),
        black: this.capturedPieces.black.map(toPieceSnapshot),
      },
      history: this.history(),
      enPassant: this.enPassantTarget ? toSquareName(this.enPassantTarget) : null,
      inCheck: {
        white: this.isInCheck('white'),
        black: this.isInCheck('black'),
      },
      ascii: this.ascii(),
    };
  }

  // ===========================================================================
  // Internal Helpers
  // ===========================================================================

  private assertLive(piece: Piece): void {
    if (!this.pieces.includes(piece)) {
      throw new PieceNotFoundError(piece.toString());
    }
  }

  /** Occupant lookup without bounds errors; off-board squares are empty */
  private occupant(file: number, rank: number): Piece | null {
    if (!isInBounds(file, rank)) return null;
    return this.occupancy[rank * 8 + file] ?? null;
  }

  private relocate(piece: Piece, to: Square): void {
    const fromIdx = squareIndex(piece.square);
    if (this.occupancy[fromIdx] === piece) {
      this.occupancy[fromIdx] = null;
    }
    piece.placeAt(to);
    this.occupancy[squareIndex(to)] = piece;
  }

  /** Remove a piece from the live set, returning its former list index */
  private detach(piece: Piece): number {
    const idx = this.pieces.indexOf(piece);
    if (idx !== -1) this.pieces.splice(idx, 1);
    const sqIdx = squareIndex(piece.square);
    if (this.occupancy[sqIdx] === piece) {
      this.occupancy[sqIdx] = null;
    }
    return idx;
  }

  private attach(piece: Piece, index: number): void {
    const at = index >= 0 && index <= this.pieces.length ? index : this.pieces.length;
    this.pieces.splice(at, 0, piece);
    this.occupancy[squareIndex(piece.square)] = piece;
  }
}

function toPieceSnapshot(piece: Piece): PieceSnapshot {
  return {
    id: piece.id,
    kind: piece.kind,
    color: piece.color,
    square: toSquareName(piece.square),
    hasMoved: piece.hasMoved,
  };
}

/**
 * Order pieces for display (captured trays): pawns first, then queen, king,
 * knight, rook, bishop. Stable within a kind.
 */
export function sortForDisplay(pieces: readonly Piece[]): Piece[] {
  return [...pieces].sort((a, b) => DISPLAY_ORDER.indexOf(a.kind) - DISPLAY_ORDER.indexOf(b.kind));
}

/**
 * Create a board in the starting position
 */
export function createChessBoard(config?: BoardConfig): ChessBoard {
  return new ChessBoard(config);
}
