import type { Triangle } from "./stl.js";
import {
  add,
  cross,
  dot,
  lookAt,
  mulMat,
  normalize,
  perspective,
  reflect,
  scale,
  sub,
  transformPoint,
  type Vec3,
} from "./vec.js";

export interface RenderOptions {
  width: number;
  height: number;
  fovDeg: number;
  eye: Vec3;
  center: Vec3;
  up: Vec3;
  light: Vec3;
  objectGray: number;
  ambient: number;
  specularPower: number;
  background: readonly [number, number, number];
}

export const DEFAULT_RENDER_OPTIONS: RenderOptions = {
  width: 1024,
  height: 1024,
  fovDeg: 30,
  eye: [3, 3, 3],
  center: [0, 0, 0],
  up: [0, 0, 1],
  light: [1, 1, 1],
  objectGray: 0.75,
  ambient: 0.2,
  specularPower: 100,
  background: [255, 255, 255],
};

export interface RasterImage {
  width: number;
  height: number;
  channels: 3;
  pixels: Uint8Array;
}

/** Uniformly scales and centres the mesh so it fits the [-1, 1] cube. */
export function fitBiUnitCube(triangles: readonly Triangle[]): Triangle[] {
  const min = [Infinity, Infinity, Infinity];
  const max = [-Infinity, -Infinity, -Infinity];
  for (const tri of triangles) {
    for (const v of tri) {
      for (let axis = 0; axis < 3; axis += 1) {
        min[axis] = Math.min(min[axis], v[axis]);
        max[axis] = Math.max(max[axis], v[axis]);
      }
    }
  }
  const extent = Math.max(max[0] - min[0], max[1] - min[1], max[2] - min[2]);
  const factor = extent > 0 ? 2 / extent : 1;
  const centre: Vec3 = [(min[0] + max[0]) / 2, (min[1] + max[1]) / 2, (min[2] + max[2]) / 2];
  const fit = (v: Vec3): Vec3 => scale(sub(v, centre), factor);
  return triangles.map((tri): Triangle => [fit(tri[0]), fit(tri[1]), fit(tri[2])]);
}

function shade(tri: Triangle, opts: RenderOptions, lightDir: Vec3): number {
  let normal = normalize(cross(sub(tri[1], tri[0]), sub(tri[2], tri[0])));
  const centroid = scale(add(add(tri[0], tri[1]), tri[2]), 1 / 3);
  const toCamera = normalize(sub(opts.eye, centroid));
  // light both faces; STL winding is not reliable
  if (dot(normal, toCamera) < 0) normal = scale(normal, -1);

  let light = opts.ambient;
  const diffuse = Math.max(dot(normal, lightDir), 0);
  light += diffuse;
  if (diffuse > 0 && opts.specularPower > 0) {
    const specular = Math.max(dot(toCamera, reflect(scale(lightDir, -1), normal)), 0);
    if (specular > 0) light += specular ** opts.specularPower;
  }
  return Math.min(opts.objectGray * light, 1);
}

/** Z-buffered flat-shaded render of the mesh into an RGB buffer. */
export function rasterize(triangles: readonly Triangle[], options: Partial<RenderOptions> = {}): RasterImage {
  const opts: RenderOptions = { ...DEFAULT_RENDER_OPTIONS, ...options };
  const { width, height } = opts;
  const pixels = new Uint8Array(width * height * 3);
  for (let i = 0; i < width * height; i += 1) {
    pixels[i * 3] = opts.background[0];
    pixels[i * 3 + 1] = opts.background[1];
    pixels[i * 3 + 2] = opts.background[2];
  }
  const depth = new Float32Array(width * height).fill(Infinity);

  const matrix = mulMat(perspective(opts.fovDeg, width / height, 1, 10), lookAt(opts.eye, opts.center, opts.up));
  const lightDir = normalize(opts.light);

  for (const tri of triangles) {
    const screen: Array<[number, number, number]> = [];
    let clipped = false;
    for (const v of tri) {
      const [x, y, z, w] = transformPoint(matrix, v);
      if (w <= 0) {
        clipped = true;
        break;
      }
      screen.push([((x / w + 1) / 2) * width, ((1 - y / w) / 2) * height, z / w]);
    }
    if (clipped) continue;

    const [a, b, c] = screen;
    const area = (b[0] - a[0]) * (c[1] - a[1]) - (b[1] - a[1]) * (c[0] - a[0]);
    if (area === 0) continue;

    const gray = Math.round(shade(tri, opts, lightDir) * 255);
    const minX = Math.max(0, Math.floor(Math.min(a[0], b[0], c[0])));
    const maxX = Math.min(width - 1, Math.ceil(Math.max(a[0], b[0], c[0])));
    const minY = Math.max(0, Math.floor(Math.min(a[1], b[1], c[1])));
    const maxY = Math.min(height - 1, Math.ceil(Math.max(a[1], b[1], c[1])));

    for (let py = minY; py <= maxY; py += 1) {
      for (let px = minX; px <= maxX; px += 1) {
        const sx = px + 0.5;
        const sy = py + 0.5;
        const w0 = ((b[0] - sx) * (c[1] - sy) - (b[1] - sy) * (c[0] - sx)) / area;
        const w1 = ((c[0] - sx) * (a[1] - sy) - (c[1] - sy) * (a[0] - sx)) / area;
        const w2 = 1 - w0 - w1;
        if (w0 < 0 || w1 < 0 || w2 < 0) continue;

        const z = w0 * a[2] + w1 * b[2] + w2 * c[2];
        if (z < -1 || z > 1) continue;
        const idx = py * width + px;
        if (z >= depth[idx]) continue;
        depth[idx] = z;
        pixels[idx * 3] = gray;
        pixels[idx * 3 + 1] = gray;
        pixels[idx * 3 + 2] = gray;
      }
    }
  }

  return { width, height, channels: 3, pixels };
}
