import { readFile } from "node:fs/promises";
import { isAbsolute, resolve } from "node:path";
import { gunzipSync } from "node:zlib";

export type PayloadReadOptions = {
  baseDir?: string;
  // False when the engine is told to inflate the payload itself (`content-encoding: gzip`).
  decompress: boolean;
};

export interface PayloadSource {
  read(ref: string, opts: PayloadReadOptions): Promise<Uint8Array>;
}

export class FilePayloadSource implements PayloadSource {
  private readonly defaultDir: string;

  public constructor(opts: { defaultDir?: string } = {}) {
    this.defaultDir = opts.defaultDir ?? process.cwd();
  }

  public async read(ref: string, opts: PayloadReadOptions): Promise<Uint8Array> {
    const path = isAbsolute(ref) ? ref : resolve(opts.baseDir ?? this.defaultDir, ref);
    const bytes = await readFile(path);
    if (opts.decompress && ref.endsWith(".gz")) return new Uint8Array(gunzipSync(bytes));
    return new Uint8Array(bytes);
  }
}
