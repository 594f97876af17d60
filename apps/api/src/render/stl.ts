import type { Vec3 } from "./vec.js";

export type Triangle = readonly [Vec3, Vec3, Vec3];

const HEADER_BYTES = 80;
const RECORD_BYTES = 50;

export class StlParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "StlParseError";
  }
}

function declaredBinaryBytes(data: Buffer): number | null {
  if (data.length < HEADER_BYTES + 4) return null;
  return HEADER_BYTES + 4 + data.readUInt32LE(HEADER_BYTES) * RECORD_BYTES;
}

function isBinaryLayout(data: Buffer): boolean {
  return declaredBinaryBytes(data) === data.length;
}

/** Binary files may carry trailing padding and a header that begins with "solid". */
function fitsBinaryLayout(data: Buffer): boolean {
  const declared = declaredBinaryBytes(data);
  return declared !== null && declared > HEADER_BYTES + 4 && data.length >= declared;
}

function looksAscii(data: Buffer): boolean {
  const head = data.subarray(0, Math.min(data.length, 512)).toString("latin1");
  return /^\s*solid\b/.test(head) && /\bfacet\b|\bendsolid\b/.test(data.toString("latin1"));
}

function parseBinary(data: Buffer): Triangle[] {
  if (data.length < HEADER_BYTES + 4) {
    throw new StlParseError("binary STL is shorter than its header");
  }
  const count = data.readUInt32LE(HEADER_BYTES);
  const expected = HEADER_BYTES + 4 + count * RECORD_BYTES;
  if (data.length < expected) {
    throw new StlParseError(`binary STL declares ${count} triangles but is truncated`);
  }

  const triangles: Triangle[] = [];
  for (let i = 0; i < count; i += 1) {
    // skip the stored facet normal; it is recomputed from the vertices
    const base = HEADER_BYTES + 4 + i * RECORD_BYTES + 12;
    const vertex = (k: number): Vec3 => [
      data.readFloatLE(base + k * 12),
      data.readFloatLE(base + k * 12 + 4),
      data.readFloatLE(base + k * 12 + 8),
    ];
    triangles.push([vertex(0), vertex(1), vertex(2)]);
  }
  return triangles;
}

const VERTEX_RE = /vertex\s+(\S+)\s+(\S+)\s+(\S+)/g;

function parseAscii(text: string): Triangle[] {
  const vertices: Vec3[] = [];
  for (const match of text.matchAll(VERTEX_RE)) {
    const coords = [Number(match[1]), Number(match[2]), Number(match[3])] as const;
    if (!coords.every(Number.isFinite)) {
      throw new StlParseError(`invalid vertex: ${match[0]}`);
    }
    vertices.push(coords);
  }
  if (vertices.length % 3 !== 0) {
    throw new StlParseError("ASCII STL vertex count is not a multiple of three");
  }

  const triangles: Triangle[] = [];
  for (let i = 0; i < vertices.length; i += 3) {
    triangles.push([vertices[i], vertices[i + 1], vertices[i + 2]]);
  }
  return triangles;
}

/** Parses binary or ASCII STL; rejects empty meshes and non-finite coordinates. */
export function parseStl(data: Buffer): Triangle[] {
  let triangles = !isBinaryLayout(data) && looksAscii(data)
    ? parseAscii(data.toString("latin1"))
    : parseBinary(data);
  if (triangles.length === 0 && fitsBinaryLayout(data)) {
    triangles = parseBinary(data);
  }

  if (triangles.length === 0) {
    throw new StlParseError("mesh has no triangles");
  }
  for (const tri of triangles) {
    for (const v of tri) {
      if (!v.every(Number.isFinite)) throw new StlParseError("mesh has non-finite coordinates");
    }
  }
  return triangles;
}
