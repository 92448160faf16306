export type Hsv = { h: number; s: number; v: number };

/** Channels in [0, 1]; hue wraps into [0, 1). */
export function rgbToHsv(r: number, g: number, b: number): Hsv {
  const max = Math.max(r, g, b);
  const min = Math.min(r, g, b);
  if (max === min) {
    return { h: 0, s: 0, v: max };
  }
  const range = max - min;
  const s = range / max;
  const rc = (max - r) / range;
  const gc = (max - g) / range;
  const bc = (max - b) / range;
  let h: number;
  if (r === max) {
    h = bc - gc;
  } else if (g === max) {
    h = 2 + rc - bc;
  } else {
    h = 4 + gc - rc;
  }
  h = (((h / 6) % 1) + 1) % 1;
  return { h, s, v: max };
}

function channelHex(value: number): string {
  const clamped = Math.max(0, Math.min(255, Math.trunc(value)));
  return clamped.toString(16).padStart(2, "0");
}

export function rgbToHex(rgb: readonly number[]): string {
  const [r = 0, g = 0, b = 0] = rgb;
  return `#${channelHex(r)}${channelHex(g)}${channelHex(b)}`;
}
