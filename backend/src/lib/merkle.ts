// ================================================================
// Merkle commitments over stored data
// ================================================================
//
// Leaves are sha256(0x00 || chunk). Inner nodes are sha256(0x01 || lo || hi)
// over the sorted pair, so an inclusion proof is just the list of sibling
// hashes, with no position bits. A node without a sibling is promoted to
// the next level as is.
//
// Stored data is committed in two levels: each piece is split into
// chunks whose tree root is the piece's mhash, and the mhash values are
// the leaves of the top-level tree whose root is the order's merkleRoot.

import crypto from 'crypto';

export const ZERO_HASH = `0x${'00'.repeat(32)}`;

function sha256Hex(data: Buffer): string {
  return `0x${crypto.createHash('sha256').update(data).digest('hex')}`;
}

function hashBytes(hash: string): Buffer {
  return Buffer.from(hash.slice(2), 'hex');
}

export function isZeroHash(hash: string): boolean {
  return /^0x0{64}$/.test(hash);
}

// Domain tags keep a leaf from ever hashing to the same value as an inner node
const LEAF_PREFIX = Buffer.from([0x00]);
const NODE_PREFIX = Buffer.from([0x01]);

export function hashLeaf(data: Buffer): string {
  return sha256Hex(Buffer.concat([LEAF_PREFIX, data]));
}

export function hashPair(a: string, b: string): string {
  const left = a.toLowerCase();
  const right = b.toLowerCase();
  const [lo, hi] = left <= right ? [left, right] : [right, left];
  return sha256Hex(Buffer.concat([NODE_PREFIX, hashBytes(lo), hashBytes(hi)]));
}

/** Folds a proof onto a leaf and returns the root it opens to. */
export function processProof(proof: readonly string[], leaf: string): string {
  return proof.reduce((node, sibling) => hashPair(node, sibling), leaf.toLowerCase());
}

export function verifyProof(proof: readonly string[], root: string, leaf: string): boolean {
  return processProof(proof, leaf) === root.toLowerCase();
}

/** Levels from leaves (index 0) up to the single root. */
export function buildTree(leaves: readonly string[]): string[][] {
  if (leaves.length === 0) {
    throw new Error('Cannot build a Merkle tree without leaves');
  }

  const levels: string[][] = [leaves.map((leaf) => leaf.toLowerCase())];
  let current = levels[0];
  while (current.length > 1) {
    const next: string[] = [];
    for (let i = 0; i < current.length; i += 2) {
      next.push(i + 1 < current.length ? hashPair(current[i], current[i + 1]) : current[i]);
    }
    levels.push(next);
    current = next;
  }
  return levels;
}

export function treeRoot(levels: readonly string[][]): string {
  return levels[levels.length - 1][0];
}

export function getProof(levels: readonly string[][], leafIndex: number): string[] {
  if (leafIndex < 0 || leafIndex >= levels[0].length) {
    throw new Error(`Leaf index ${leafIndex} out of range (0..${levels[0].length - 1})`);
  }

  const proof: string[] = [];
  let index = leafIndex;
  for (let level = 0; level < levels.length - 1; level++) {
    const sibling = index ^ 1;
    if (sibling < levels[level].length) {
      proof.push(levels[level][sibling]);
    }
    index = Math.floor(index / 2);
  }
  return proof;
}

// ========== Two-level commitment ==========

export interface PieceTree {
  mhash: string;
  chunks: Buffer[];
  levels: string[][];
}

export interface DataCommitment {
  merkleRoot: string;
  pieceSize: number;
  leafCount: number;
  chunkSize: number;
  pieces: PieceTree[];
  levels: string[][];
}

export interface ChunkProof {
  pieceIndex: number;
  mhash: string;
  proofs: string[];               // Opens mhash under merkleRoot
  chunkIndex: number;
  chunkData: Buffer;
  subpath: string[];              // Opens hashLeaf(chunkData) under mhash
}

export function splitBuffer(data: Buffer, size: number): Buffer[] {
  if (!Number.isInteger(size) || size <= 0) {
    throw new Error(`Split size must be a positive integer, got ${size}`);
  }
  const parts: Buffer[] = [];
  for (let offset = 0; offset < data.length; offset += size) {
    parts.push(data.subarray(offset, offset + size));
  }
  return parts;
}

export function buildPieceTree(piece: Buffer, chunkSize: number): PieceTree {
  const chunks = splitBuffer(piece, chunkSize);
  const levels = buildTree(chunks.map(hashLeaf));
  return { mhash: treeRoot(levels), chunks, levels };
}

export function buildCommitment(data: Buffer, pieceSize: number, chunkSize: number): DataCommitment {
  if (data.length === 0) {
    throw new Error('Cannot commit to empty data');
  }

  const pieces = splitBuffer(data, pieceSize).map((piece) => buildPieceTree(piece, chunkSize));
  const levels = buildTree(pieces.map((piece) => piece.mhash));

  return {
    merkleRoot: treeRoot(levels),
    pieceSize,
    leafCount: pieces.length,
    chunkSize,
    pieces,
    levels,
  };
}

export function proveChunk(commitment: DataCommitment, pieceIndex: number, chunkIndex: number): ChunkProof {
  const piece = commitment.pieces[pieceIndex];
  if (!piece) {
    throw new Error(`Piece ${pieceIndex} out of range (0..${commitment.leafCount - 1})`);
  }
  const chunkData = piece.chunks[chunkIndex];
  if (!chunkData) {
    throw new Error(`Chunk ${chunkIndex} out of range (0..${piece.chunks.length - 1})`);
  }

  return {
    pieceIndex,
    mhash: piece.mhash,
    proofs: getProof(commitment.levels, pieceIndex),
    chunkIndex,
    chunkData,
    subpath: getProof(piece.levels, chunkIndex),
  };
}
