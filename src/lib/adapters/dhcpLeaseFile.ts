import { readFile } from "node:fs/promises";

import { parseLeaseLine } from "@/lib/api/transformers";
import { LeaseTableUnavailableError } from "@/lib/domain/errors";
import type { LeaseEntry } from "@/lib/domain/models";
import type { LeaseTablePort } from "@/lib/ports/LeaseTablePort";

export class DhcpLeaseFileAdapter implements LeaseTablePort {
  constructor(private readonly path: string) {}

  async readLeases(): Promise<LeaseEntry[]> {
    let contents: string;
    try {
      contents = await readFile(this.path, "utf8");
    } catch (error) {
      throw new LeaseTableUnavailableError(this.path, { cause: error });
    }
    return contents
      .split("\n")
      .map(parseLeaseLine)
      .filter((entry): entry is LeaseEntry => entry !== null);
  }
}
