// ================================================================
// Storage commitment tool
// ================================================================
//
// Builds the two-level Merkle commitment for a local file and prints
// the arguments the market expects.
//
//   build <file> [pieceSize] [chunkSize]
//       -> merkleRoot, pieceSize, leafCount for POST /orders/:id/prepare
//
//   prove <file> <pieceIndex> <chunkIndex> [pieceSize] [chunkSize]
//       -> body for POST /challenges (consumer) and
//          POST /challenges/:id/proof (provider)
//
// Usage:
//   npm run commitment -- build ./backup.tar
//   npm run commitment -- prove ./backup.tar 3 0

import * as fs from 'fs';
import { buildCommitment, proveChunk } from '../backend/src/lib/merkle';

const DEFAULT_PIECE_SIZE = 1024 * 1024;
const DEFAULT_CHUNK_SIZE = 1024;

function parseSize(value: string | undefined, fallback: number, name: string): number {
  if (value === undefined) return fallback;
  const size = Number(value);
  if (!Number.isInteger(size) || size <= 0) {
    throw new Error(`${name} must be a positive integer, got "${value}"`);
  }
  return size;
}

function readData(file: string | undefined): Buffer {
  if (!file) {
    throw new Error('A file path is required');
  }
  return fs.readFileSync(file);
}

function usage(): never {
  console.error('Usage:');
  console.error('  commitment build <file> [pieceSize] [chunkSize]');
  console.error('  commitment prove <file> <pieceIndex> <chunkIndex> [pieceSize] [chunkSize]');
  process.exit(1);
}

function main(argv: string[]): void {
  const [command, file, ...rest] = argv;

  switch (command) {
    case 'build': {
      const pieceSize = parseSize(rest[0], DEFAULT_PIECE_SIZE, 'pieceSize');
      const chunkSize = parseSize(rest[1], DEFAULT_CHUNK_SIZE, 'chunkSize');
      const commitment = buildCommitment(readData(file), pieceSize, chunkSize);

      console.log(JSON.stringify({
        merkleRoot: commitment.merkleRoot,
        pieceSize: commitment.pieceSize,
        leafCount: commitment.leafCount,
      }, null, 2));
      return;
    }

    case 'prove': {
      if (rest[0] === undefined || rest[1] === undefined) usage();
      const pieceIndex = Number(rest[0]);
      const chunkIndex = Number(rest[1]);
      const pieceSize = parseSize(rest[2], DEFAULT_PIECE_SIZE, 'pieceSize');
      const chunkSize = parseSize(rest[3], DEFAULT_CHUNK_SIZE, 'chunkSize');
      const commitment = buildCommitment(readData(file), pieceSize, chunkSize);
      const proof = proveChunk(commitment, pieceIndex, chunkIndex);

      console.log(JSON.stringify({
        startChallenge: {
          pieceIndex: proof.pieceIndex,
          mhash: proof.mhash,
          proofs: proof.proofs,
        },
        proofChallenge: {
          chunkData: `0x${proof.chunkData.toString('hex')}`,
          subpath: proof.subpath,
        },
      }, null, 2));
      return;
    }

    default:
      usage();
  }
}

try {
  main(process.argv.slice(2));
} catch (e) {
  console.error(`❌ ${e instanceof Error ? e.message : String(e)}`);
  process.exit(1);
}
