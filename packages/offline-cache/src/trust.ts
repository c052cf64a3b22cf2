/**
 * Structural verification of downloaded cabinet files
 */

import { open } from "node:fs/promises";

const CABINET_SIGNATURE = "MSCF";
const CABINET_HEADER_BYTES = 12;

/**
 * Checks the cabinet signature bytes and that the cabinet size recorded in the
 * header matches the file on disk. This is not an Authenticode chain check;
 * callers that need one pass their own verifier to the sync engine.
 */
export async function verifyCabinetFile(filePath: string): Promise<boolean> {
  const handle = await open(filePath, "r").catch(() => null);
  if (!handle) {
    return false;
  }

  try {
    const { size } = await handle.stat();
    if (size < CABINET_HEADER_BYTES) {
      return false;
    }

    const header = Buffer.alloc(CABINET_HEADER_BYTES);
    await handle.read(header, 0, CABINET_HEADER_BYTES, 0);

    if (header.toString("latin1", 0, 4) !== CABINET_SIGNATURE) {
      return false;
    }

    return header.readUInt32LE(8) === size;
  } finally {
    await handle.close();
  }
}
