import fs, { type FileHandle } from "node:fs/promises";
import type { SegmentCatalog, TSegment } from "@shared/kernel-phase-format";
import { ContainerReadError } from "./validatorErrors";

export const FITS_BLOCK_BYTES = 2880;
export const FITS_CARD_BYTES = 80;

const CARDS_PER_BLOCK = FITS_BLOCK_BYTES / FITS_CARD_BYTES;
const VALID_BITPIX = new Set([8, 16, 32, 64, -32, -64]);
const TABLE_XTENSIONS = new Set(["BINTABLE", "TABLE"]);

type HeaderValue = string | number | boolean;

type Header = Map<string, HeaderValue>;

class HeaderFault extends Error {}

interface BlockSource {
  readonly size: number;
  read(offset: number, length: number): Promise<Buffer>;
}

const bufferSource = (buffer: Buffer): BlockSource => ({
  size: buffer.length,
  read: async (offset, length) => buffer.subarray(offset, Math.min(offset + length, buffer.length)),
});

const parseQuoted = (raw: string): string => {
  let out = "";
  for (let i = 1; i < raw.length; i += 1) {
    const ch = raw[i];
    if (ch === "'") {
      if (raw[i + 1] === "'") {
        out += "'";
        i += 1;
        continue;
      }
      break;
    }
    out += ch;
  }
  return out.trimEnd();
};

const parseCardValue = (raw: string): HeaderValue => {
  const trimmed = raw.trimStart();
  if (trimmed.startsWith("'")) return parseQuoted(trimmed);
  const slash = trimmed.indexOf("/");
  const token = (slash >= 0 ? trimmed.slice(0, slash) : trimmed).trim();
  if (token === "T") return true;
  if (token === "F") return false;
  const numeric = Number(token.replace(/[dD]/, "E"));
  return token.length && Number.isFinite(numeric) ? numeric : token;
};

const isPadding = (bytes: Buffer): boolean => bytes.every((byte) => byte === 0 || byte === 0x20);

async function readHeader(
  source: BlockSource,
  start: number,
  label: string,
): Promise<{ header: Header; firstKeyword: string | undefined; dataStart: number }> {
  const header: Header = new Map();
  let firstKeyword: string | undefined;
  let offset = start;
  while (offset + FITS_BLOCK_BYTES <= source.size) {
    const block = await source.read(offset, FITS_BLOCK_BYTES);
    offset += FITS_BLOCK_BYTES;
    for (let card = 0; card < CARDS_PER_BLOCK; card += 1) {
      const text = block.toString("latin1", card * FITS_CARD_BYTES, (card + 1) * FITS_CARD_BYTES);
      const keyword = text.slice(0, 8).trimEnd();
      firstKeyword ??= keyword;
      if (keyword === "END") {
        return { header, firstKeyword, dataStart: offset };
      }
      if (text.slice(8, 10) === "= " && !header.has(keyword)) {
        header.set(keyword, parseCardValue(text.slice(10)));
      }
    }
  }
  throw new HeaderFault(`${label}: header has no END card`);
}

const requireInt = (header: Header, keyword: string, label: string): number => {
  const value = header.get(keyword);
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw new HeaderFault(`${label}: missing or invalid ${keyword}`);
  }
  return value;
};

const optionalInt = (header: Header, keyword: string, fallback: number, label: string): number =>
  header.has(keyword) ? requireInt(header, keyword, label) : fallback;

const stringValue = (header: Header, keyword: string): string | undefined => {
  const value = header.get(keyword);
  return typeof value === "string" ? value.trim() : undefined;
};

function describeHdu(header: Header, index: number, label: string): { segment: TSegment; dataBytes: number } {
  const bitpix = requireInt(header, "BITPIX", label);
  if (!VALID_BITPIX.has(bitpix)) {
    throw new HeaderFault(`${label}: unsupported BITPIX ${bitpix}`);
  }
  const naxis = requireInt(header, "NAXIS", label);
  if (naxis < 0 || naxis > 999) {
    throw new HeaderFault(`${label}: NAXIS ${naxis} out of range`);
  }
  const axes: number[] = [];
  for (let n = 1; n <= naxis; n += 1) {
    const length = requireInt(header, `NAXIS${n}`, label);
    if (length < 0) {
      throw new HeaderFault(`${label}: NAXIS${n} is negative`);
    }
    axes.push(length);
  }
  const pcount = optionalInt(header, "PCOUNT", 0, label);
  const gcount = optionalInt(header, "GCOUNT", 1, label);
  const elements = naxis === 0 ? 0 : axes.reduce((product, length) => product * length, 1);
  const dataBytes = naxis === 0 ? 0 : (Math.abs(bitpix) / 8) * gcount * (pcount + elements);

  const xtension = (stringValue(header, "XTENSION") ?? "").toUpperCase();
  const shape = TABLE_XTENSIONS.has(xtension) ? axes.slice(1, 2) : [...axes].reverse();
  const name = stringValue(header, "EXTNAME") ?? (index === 0 ? "PRIMARY" : "");

  return { segment: Object.freeze({ name, shape: Object.freeze(shape) }), dataBytes };
}

async function walkHdus(source: BlockSource, path: string): Promise<SegmentCatalog> {
  const segments: TSegment[] = [];
  let offset = 0;
  try {
    while (offset < source.size) {
      const index = segments.length;
      const label = `HDU #${index}`;
      if (index > 0) {
        const probe = await source.read(offset, FITS_BLOCK_BYTES);
        if (isPadding(probe) && offset + probe.length >= source.size) break;
      }
      const { header, firstKeyword, dataStart } = await readHeader(source, offset, label);
      if (index === 0 && (firstKeyword !== "SIMPLE" || header.get("SIMPLE") !== true)) {
        throw new HeaderFault("not a FITS file (missing SIMPLE = T)");
      }
      if (index > 0 && firstKeyword !== "XTENSION") {
        throw new HeaderFault(`unexpected bytes at offset ${offset} (expected XTENSION)`);
      }
      const { segment, dataBytes } = describeHdu(header, index, label);
      if (dataStart + dataBytes > source.size) {
        throw new HeaderFault(`${label} (${segment.name || "unnamed"}): data is truncated`);
      }
      segments.push(segment);
      const blocks = Math.ceil(dataBytes / FITS_BLOCK_BYTES);
      offset = Math.min(dataStart + blocks * FITS_BLOCK_BYTES, source.size);
    }
  } catch (err) {
    if (err instanceof HeaderFault) {
      throw new ContainerReadError(err.message, path);
    }
    throw err;
  }
  if (!segments.length) {
    throw new ContainerReadError("not a FITS file (empty)", path);
  }
  return segments;
}

/**
 * Lists the segments of an in-memory FITS file. Only headers are decoded.
 */
export function parseSegmentCatalog(buffer: Buffer, path = "<buffer>"): Promise<SegmentCatalog> {
  return walkHdus(bufferSource(buffer), path);
}

/**
 * Lists the segments of a FITS file on disk, reading header blocks and
 * seeking past data so large cubes are never loaded.
 */
export async function readSegmentCatalog(path: string): Promise<SegmentCatalog> {
  let handle: FileHandle;
  try {
    handle = await fs.open(path, "r");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ContainerReadError(`cannot open file (${message})`, path);
  }
  try {
    const { size } = await handle.stat();
    const source: BlockSource = {
      size,
      read: async (offset, length) => {
        const chunk = Buffer.alloc(Math.min(length, size - offset));
        const { bytesRead } = await handle.read(chunk, 0, chunk.length, offset);
        return chunk.subarray(0, bytesRead);
      },
    };
    return await walkHdus(source, path);
  } finally {
    await handle.close();
  }
}
