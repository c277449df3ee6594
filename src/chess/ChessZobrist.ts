/**
 * ChessZobrist - 64-bit position keys
 *
 * Keys the opening book. A key covers piece placement, side to move,
 * castling rights and the en passant file, and is computed from FEN.
 * The key tables come from a fixed-seed xorshift64* generator, so keys are
 * identical across runs and across the book builder and reader.
 *
 * @module chess/ChessZobrist
 */

/** Zobrist key tables */
interface ZobristKeys {
  /** Piece keys: [colorIndex][pieceIndex][squareIndex] */
  pieces: bigint[][][];
  /** XORed in when Black is to move */
  sideToMove: bigint;
  /** Castling rights keys [K, Q, k, q] */
  castling: bigint[];
  /** En passant file keys [a-h files] */
  enPassant: bigint[];
}

const PIECE_INDEX: Record<string, number> = {
  p: 0, n: 1, b: 2, r: 3, q: 4, k: 5,
};

const CASTLING_FLAGS = ['K', 'Q', 'k', 'q'] as const;

const MASK_64 = 0xFFFFFFFFFFFFFFFFn;

/**
 * xorshift64* generator
 */
class KeyGenerator {
  private state: bigint;

  constructor(seed: bigint) {
    this.state = seed;
  }

  next(): bigint {
    let x = this.state;
    x ^= x >> 12n;
    x ^= (x << 25n) & MASK_64;
    x ^= x >> 27n;
    this.state = x;
    return (x * 0x2545F4914F6CDD1Dn) & MASK_64;
  }
}

function generateZobristKeys(): ZobristKeys {
  const rng = new KeyGenerator(0x1234567890ABCDEFn);

  // 2 colors × 6 piece types × 64 squares
  const pieces: bigint[][][] = [];
  for (let color = 0; color < 2; color++) {
    pieces[color] = [];
    for (let piece = 0; piece < 6; piece++) {
      pieces[color][piece] = [];
      for (let square = 0; square < 64; square++) {
        pieces[color][piece][square] = rng.next();
      }
    }
  }

  const sideToMove = rng.next();
  const castling = CASTLING_FLAGS.map(() => rng.next());

  const enPassant: bigint[] = [];
  for (let file = 0; file < 8; file++) {
    enPassant.push(rng.next());
  }

  return { pieces, sideToMove, castling, enPassant };
}

const ZOBRIST_KEYS = generateZobristKeys();

/**
 * Compute the Zobrist key of a FEN position
 * @returns Unsigned 64-bit key
 */
export function computeZobristHash(fen: string): bigint {
  const [placement = '', turn = 'w', castling = '-', enPassant = '-'] = fen.trim().split(/\s+/);
  let hash = 0n;

  const rows = placement.split('/');
  for (let row = 0; row < rows.length && row < 8; row++) {
    const rank = 7 - row;
    let file = 0;

    for (const char of rows[row]) {
      if (char >= '1' && char <= '8') {
        file += Number(char);
        continue;
      }
      const pieceIndex = PIECE_INDEX[char.toLowerCase()];
      if (pieceIndex !== undefined && file < 8) {
        const colorIndex = char === char.toUpperCase() ? 0 : 1;
        hash ^= ZOBRIST_KEYS.pieces[colorIndex][pieceIndex][rank * 8 + file];
      }
      file++;
    }
  }

  if (turn === 'b') {
    hash ^= ZOBRIST_KEYS.sideToMove;
  }

  CASTLING_FLAGS.forEach((flag, index) => {
    if (castling.includes(flag)) {
      hash ^= ZOBRIST_KEYS.castling[index];
    }
  });

  if (enPassant !== '-') {
    const epFile = enPassant.charCodeAt(0) - 97;
    if (epFile >= 0 && epFile < 8) {
      hash ^= ZOBRIST_KEYS.enPassant[epFile];
    }
  }

  return hash;
}
