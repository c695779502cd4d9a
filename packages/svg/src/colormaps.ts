/** Evenly spaced colour stops, darkest first. */
const COLORMAPS: Readonly<Record<string, readonly string[]>> = {
  gray: ['#000000', '#ffffff'],
  grey: ['#000000', '#ffffff'],
  red: ['#000000', '#ff0000'],
  green: ['#000000', '#00ff00'],
  blue: ['#000000', '#0000ff'],
  viridis: ['#440154', '#3b528b', '#21918c', '#5ec962', '#fde725'],
  magma: ['#000004', '#51127c', '#b73779', '#fc8961', '#fcfdbf'],
};

export function hasColormap(name: string): boolean {
  return Object.prototype.hasOwnProperty.call(COLORMAPS, name);
}

export function colormapNames(): string[] {
  return Object.keys(COLORMAPS);
}

function parseHex(hex: string): [number, number, number] {
  const channel = (i: number) => parseInt(hex.slice(i, i + 2), 16);
  return [channel(1), channel(3), channel(5)];
}

function toHex(channel: number): string {
  return Math.round(channel).toString(16).padStart(2, '0');
}

/**
 * Colour at `t` (clamped to [0, 1]) along the named map, linearly
 * interpolated between stops. Returns `#rrggbb`.
 */
export function sampleColormap(name: string, t: number): string {
  const stops = COLORMAPS[name];
  if (!stops) throw new Error(`sampleColormap: unknown colormap "${name}"`);
  const clamped = Math.min(1, Math.max(0, t));
  const scaled = clamped * (stops.length - 1);
  const lo = Math.min(Math.floor(scaled), stops.length - 2);
  const frac = scaled - lo;
  const a = parseHex(stops[lo]);
  const b = parseHex(stops[lo + 1]);
  return '#' + a.map((c, i) => toHex(c + (b[i] - c) * frac)).join('');
}
