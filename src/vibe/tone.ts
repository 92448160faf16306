import type { Hsv } from "../lib/color.js";

export type HueTone = "warm" | "cool" | "neutral";
export type SaturationTone = "saturated" | "muted";
export type ValueTone = "bright" | "dark" | "midtone";

export type Tone = {
  hue: HueTone;
  saturation: SaturationTone;
  value: ValueTone;
};

export function classifyTone({ h, s, v }: Hsv): Tone {
  let hue: HueTone = "neutral";
  if (h < 0.15 || h > 0.85) hue = "warm";
  else if (h > 0.45 && h < 0.75) hue = "cool";

  let value: ValueTone = "midtone";
  if (v > 0.6) value = "bright";
  else if (v < 0.35) value = "dark";

  return { hue, saturation: s > 0.45 ? "saturated" : "muted", value };
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}

export function toneCaption(tone: Tone): string {
  return `${tone.hue}, ${tone.saturation}, ${tone.value} palette`;
}

export function toneLabel(tone: Tone): string {
  return [tone.hue, tone.saturation, tone.value].map(capitalize).join(" · ");
}

const HUE_PROSE: Record<HueTone, string> = {
  warm: "reds/oranges",
  cool: "blues/greens",
  neutral: "balanced hues",
};

const SATURATION_PROSE: Record<SaturationTone, string> = {
  saturated: "rich color blocks",
  muted: "soft, desaturated tones",
};

const VALUE_PROSE: Record<ValueTone, string> = {
  bright: "high-key, airy feel",
  dark: "low-key, moody feel",
  midtone: "even midtones",
};

export function toneSummary(tone: Tone, count: number): string {
  const noun = count === 1 ? "cover" : "covers";
  const prose = [HUE_PROSE[tone.hue], SATURATION_PROSE[tone.saturation], VALUE_PROSE[tone.value]];
  return `${count} ${noun} leaning toward ${prose.join(", ")}.`;
}

export function meanHsv(values: Hsv[]): Hsv {
  if (values.length === 0) return { h: 0, s: 0, v: 0 };
  const sum = values.reduce(
    (acc, hsv) => ({ h: acc.h + hsv.h, s: acc.s + hsv.s, v: acc.v + hsv.v }),
    { h: 0, s: 0, v: 0 }
  );
  return { h: sum.h / values.length, s: sum.s / values.length, v: sum.v / values.length };
}
