/**
 * Color Space Conversion
 * Converts between gamma-encoded sRGB and the interpolation spaces a
 * `linear-gradient(in <space>, ...)` can name, and interpolates two colors
 * following CSS Color 4 (premultiplied alpha, hue fix-up by direction).
 *
 * Matrices are the CSS Color 4 reference values.
 */

import type { ColorSpace, HueDirection, Rgba } from './types.js';

export type Channels = [number, number, number];
type Matrix = readonly [Channels, Channels, Channels];

function multiply(m: Matrix, [x, y, z]: Channels): Channels {
  return [
    m[0][0] * x + m[0][1] * y + m[0][2] * z,
    m[1][0] * x + m[1][1] * y + m[1][2] * z,
    m[2][0] * x + m[2][1] * y + m[2][2] * z,
  ];
}

const LINEAR_SRGB_TO_XYZ: Matrix = [
  [506752 / 1228815, 87881 / 245763, 12673 / 70218],
  [87098 / 409605, 175762 / 245763, 12673 / 175545],
  [7918 / 409605, 87881 / 737289, 1001167 / 1053270],
];

const XYZ_TO_LINEAR_SRGB: Matrix = [
  [12831 / 3959, -329 / 214, -1974 / 3959],
  [-851781 / 878810, 1648619 / 878810, 36519 / 878810],
  [705 / 12673, -2585 / 12673, 705 / 667],
];

const LINEAR_P3_TO_XYZ: Matrix = [
  [608311 / 1250200, 189793 / 714400, 198249 / 1000160],
  [35783 / 156275, 247089 / 357200, 198249 / 2500400],
  [0, 32229 / 714400, 5220557 / 5000800],
];

const XYZ_TO_LINEAR_P3: Matrix = [
  [446124 / 178915, -333277 / 357830, -72051 / 178915],
  [-14852 / 17905, 63121 / 35810, 423 / 17905],
  [11844 / 330415, -50337 / 660830, 316169 / 330415],
];

const LINEAR_A98_TO_XYZ: Matrix = [
  [573536 / 994567, 263643 / 1420810, 187206 / 994567],
  [591459 / 1989134, 6239551 / 9945670, 374412 / 4972835],
  [53769 / 1989134, 351524 / 4972835, 4929758 / 4972835],
];

const XYZ_TO_LINEAR_A98: Matrix = [
  [1829569 / 896150, -506331 / 896150, -308931 / 896150],
  [-851781 / 878810, 1648619 / 878810, 36519 / 878810],
  [16779 / 1248040, -147721 / 1248040, 1266979 / 1248040],
];

// ProPhoto is defined against D50
const LINEAR_PROPHOTO_TO_XYZ_D50: Matrix = [
  [0.7977666449006423, 0.13518129740053308, 0.0313477341283922],
  [0.2880748288194013, 0.711835234241873, 0.00008993693872564],
  [0, 0, 0.8251046025104602],
];

const XYZ_D50_TO_LINEAR_PROPHOTO: Matrix = [
  [1.3457868816471583, -0.25557208737979464, -0.05110186497554526],
  [-0.5446307051249019, 1.5082477428451468, 0.02052744743642139],
  [0, 0, 1.2119675456389452],
];

const LINEAR_REC2020_TO_XYZ: Matrix = [
  [63426534 / 99577255, 20160776 / 139408157, 47086771 / 278816314],
  [26158966 / 99577255, 472592308 / 697040785, 8267143 / 139408157],
  [0, 19567812 / 697040785, 295819943 / 278816314],
];

const XYZ_TO_LINEAR_REC2020: Matrix = [
  [30757411 / 17917100, -6372589 / 17917100, -4539589 / 17917100],
  [-19765991 / 29648200, 47925759 / 29648200, 467509 / 29648200],
  [792561 / 44930125, -1921689 / 44930125, 42328811 / 44930125],
];

const D65_TO_D50: Matrix = [
  [1.0479297925449969, 0.022946870601609652, -0.05019226628920524],
  [0.02962780877005599, 0.9904344267538799, -0.017073799063418826],
  [-0.009243040646204504, 0.015055191490298152, 0.7518742814281371],
];

const D50_TO_D65: Matrix = [
  [0.955473421488075, -0.02309845494876471, 0.06325924320057072],
  [-0.0283697093338637, 1.0099953980813041, 0.021041441191917323],
  [0.012314014864481998, -0.020507649298898964, 1.330365926242124],
];

const D50_WHITE: Channels = [0.3457 / 0.3585, 1, (1 - 0.3457 - 0.3585) / 0.3585];

// ---------- Transfer functions ----------

function srgbToLinear(c: number): number {
  const abs = Math.abs(c);
  if (abs <= 0.04045) return c / 12.92;
  return Math.sign(c) * Math.pow((abs + 0.055) / 1.055, 2.4);
}

function linearToSrgb(c: number): number {
  const abs = Math.abs(c);
  if (abs > 0.0031308) return Math.sign(c) * (1.055 * Math.pow(abs, 1 / 2.4) - 0.055);
  return 12.92 * c;
}

function a98ToLinear(c: number): number {
  return Math.sign(c) * Math.pow(Math.abs(c), 563 / 256);
}

function linearToA98(c: number): number {
  return Math.sign(c) * Math.pow(Math.abs(c), 256 / 563);
}

function prophotoToLinear(c: number): number {
  const abs = Math.abs(c);
  if (abs <= 16 / 512) return c / 16;
  return Math.sign(c) * Math.pow(abs, 1.8);
}

function linearToProphoto(c: number): number {
  const abs = Math.abs(c);
  if (abs >= 1 / 512) return Math.sign(c) * Math.pow(abs, 1 / 1.8);
  return 16 * c;
}

const REC2020_ALPHA = 1.09929682680944;
const REC2020_BETA = 0.018053968510807;

function rec2020ToLinear(c: number): number {
  const abs = Math.abs(c);
  if (abs < REC2020_BETA * 4.5) return c / 4.5;
  return Math.sign(c) * Math.pow((abs + REC2020_ALPHA - 1) / REC2020_ALPHA, 1 / 0.45);
}

function linearToRec2020(c: number): number {
  const abs = Math.abs(c);
  if (abs > REC2020_BETA) return Math.sign(c) * (REC2020_ALPHA * Math.pow(abs, 0.45) - (REC2020_ALPHA - 1));
  return 4.5 * c;
}

const mapChannels = (c: Channels, f: (v: number) => number): Channels => [f(c[0]), f(c[1]), f(c[2])];

// ---------- Lab / OKLab ----------

const LAB_EPSILON = 216 / 24389;
const LAB_KAPPA = 24389 / 27;

function xyzD50ToLab(xyz: Channels): Channels {
  const [fx, fy, fz] = xyz.map((v, i) => {
    const scaled = v / D50_WHITE[i];
    return scaled > LAB_EPSILON ? Math.cbrt(scaled) : (LAB_KAPPA * scaled + 16) / 116;
  });
  return [116 * fy - 16, 500 * (fx - fy), 200 * (fy - fz)];
}

function labToXyzD50([l, a, b]: Channels): Channels {
  const fy = (l + 16) / 116;
  const fx = a / 500 + fy;
  const fz = fy - b / 200;
  const x = fx ** 3 > LAB_EPSILON ? fx ** 3 : (116 * fx - 16) / LAB_KAPPA;
  const y = l > LAB_KAPPA * LAB_EPSILON ? fy ** 3 : l / LAB_KAPPA;
  const z = fz ** 3 > LAB_EPSILON ? fz ** 3 : (116 * fz - 16) / LAB_KAPPA;
  return [x * D50_WHITE[0], y * D50_WHITE[1], z * D50_WHITE[2]];
}

function linearSrgbToOklab([r, g, b]: Channels): Channels {
  const l = Math.cbrt(0.4122214708 * r + 0.5363325363 * g + 0.0514459929 * b);
  const m = Math.cbrt(0.2119034982 * r + 0.6806995451 * g + 0.1073969566 * b);
  const s = Math.cbrt(0.0883024619 * r + 0.2817188376 * g + 0.6299787005 * b);
  return [
    0.2104542553 * l + 0.793617785 * m - 0.0040720468 * s,
    1.9779984951 * l - 2.428592205 * m + 0.4505937099 * s,
    0.0259040371 * l + 0.7827717662 * m - 0.808675766 * s,
  ];
}

function oklabToLinearSrgb([lightness, a, b]: Channels): Channels {
  const l = (lightness + 0.3963377774 * a + 0.2158037573 * b) ** 3;
  const m = (lightness - 0.1055613458 * a - 0.0638541728 * b) ** 3;
  const s = (lightness - 0.0894841775 * a - 1.291485548 * b) ** 3;
  return [
    4.0767416621 * l - 3.3077115913 * m + 0.2309699292 * s,
    -1.2684380046 * l + 2.6097574011 * m - 0.3413193965 * s,
    -0.0041960863 * l - 0.7034186147 * m + 1.707614701 * s,
  ];
}

/** Cartesian (L, a, b) to polar (L, C, h). An achromatic color gets a NaN ("powerless") hue. */
function toPolar([l, a, b]: Channels, epsilon: number): Channels {
  const chroma = Math.sqrt(a * a + b * b);
  if (chroma < epsilon) return [l, chroma, NaN];
  const hue = (Math.atan2(b, a) * 180) / Math.PI;
  return [l, chroma, normalizeHue(hue)];
}

function fromPolar([l, c, h]: Channels): Channels {
  if (Number.isNaN(h)) return [l, 0, 0];
  const radians = (h * Math.PI) / 180;
  return [l, c * Math.cos(radians), c * Math.sin(radians)];
}

// ---------- HSL / HWB (channels: hue degrees, then fractions) ----------

export function hslToSrgb([h, s, l]: Channels): Channels {
  const hue = Number.isNaN(h) ? 0 : normalizeHue(h);
  const k = (n: number) => (n + hue / 30) % 12;
  const a = s * Math.min(l, 1 - l);
  const f = (n: number) => l - a * Math.max(-1, Math.min(k(n) - 3, 9 - k(n), 1));
  return [f(0), f(8), f(4)];
}

function srgbToHsl([r, g, b]: Channels): Channels {
  const max = Math.max(r, g, b);
  const min = Math.min(r, g, b);
  const l = (max + min) / 2;
  const d = max - min;
  if (d === 0) return [NaN, 0, l];
  const s = l === 0 || l === 1 ? 0 : (max - l) / Math.min(l, 1 - l);
  let h: number;
  if (max === r) {
    h = (g - b) / d + (g < b ? 6 : 0);
  } else if (max === g) {
    h = (b - r) / d + 2;
  } else {
    h = (r - g) / d + 4;
  }
  return [h * 60, s, l];
}

export function hwbToSrgb([h, w, b]: Channels): Channels {
  if (w + b >= 1) {
    const gray = w / (w + b);
    return [gray, gray, gray];
  }
  const rgb = hslToSrgb([h, 1, 0.5]);
  return mapChannels(rgb, (c) => c * (1 - w - b) + w);
}

function srgbToHwb(rgb: Channels): Channels {
  const [h] = srgbToHsl(rgb);
  const white = Math.min(...rgb);
  const black = 1 - Math.max(...rgb);
  return [white + black >= 1 ? NaN : h, white, black];
}

// ---------- Dispatch ----------

/** Space in which channels are stored; the ACES spaces are linear and interpolate exactly in XYZ. */
type WorkingSpace = Exclude<ColorSpace, 'acescg' | 'aces2065-1'>;

function workingSpace(space: ColorSpace): WorkingSpace {
  return space === 'acescg' || space === 'aces2065-1' ? 'xyz-d65' : space;
}

/** Index of the hue channel, or -1 for rectangular spaces. */
export function hueIndex(space: ColorSpace): number {
  switch (workingSpace(space)) {
    case 'hsl':
    case 'hwb':
      return 0;
    case 'lch':
    case 'oklch':
      return 2;
    default:
      return -1;
  }
}

/** Convert channels in `space` to gamma-encoded sRGB (0–1, unclipped). */
export function toSrgb(space: ColorSpace, channels: Channels): Channels {
  const linearFromXyz = (xyz: Channels) => mapChannels(multiply(XYZ_TO_LINEAR_SRGB, xyz), linearToSrgb);
  switch (workingSpace(space)) {
    case 'srgb':
      return channels;
    case 'srgb-linear':
      return mapChannels(channels, linearToSrgb);
    case 'display-p3':
      return linearFromXyz(multiply(LINEAR_P3_TO_XYZ, mapChannels(channels, srgbToLinear)));
    case 'a98-rgb':
      return linearFromXyz(multiply(LINEAR_A98_TO_XYZ, mapChannels(channels, a98ToLinear)));
    case 'prophoto-rgb':
      return linearFromXyz(
        multiply(D50_TO_D65, multiply(LINEAR_PROPHOTO_TO_XYZ_D50, mapChannels(channels, prophotoToLinear))),
      );
    case 'rec2020':
      return linearFromXyz(multiply(LINEAR_REC2020_TO_XYZ, mapChannels(channels, rec2020ToLinear)));
    case 'lab':
      return linearFromXyz(multiply(D50_TO_D65, labToXyzD50(channels)));
    case 'lch':
      return linearFromXyz(multiply(D50_TO_D65, labToXyzD50(fromPolar(channels))));
    case 'hsl':
      return hslToSrgb(channels);
    case 'hwb':
      return hwbToSrgb(channels);
    case 'oklab':
      return mapChannels(oklabToLinearSrgb(channels), linearToSrgb);
    case 'oklch':
      return mapChannels(oklabToLinearSrgb(fromPolar(channels)), linearToSrgb);
    case 'xyz-d50':
      return linearFromXyz(multiply(D50_TO_D65, channels));
    case 'xyz-d65':
      return linearFromXyz(channels);
  }
}

/** Convert gamma-encoded sRGB (0–1) into `space`. */
export function fromSrgb(space: ColorSpace, rgb: Channels): Channels {
  const linear = mapChannels(rgb, srgbToLinear);
  const xyz = () => multiply(LINEAR_SRGB_TO_XYZ, linear);
  switch (workingSpace(space)) {
    case 'srgb':
      return rgb;
    case 'srgb-linear':
      return linear;
    case 'display-p3':
      return mapChannels(multiply(XYZ_TO_LINEAR_P3, xyz()), linearToSrgb);
    case 'a98-rgb':
      return mapChannels(multiply(XYZ_TO_LINEAR_A98, xyz()), linearToA98);
    case 'prophoto-rgb':
      return mapChannels(multiply(XYZ_D50_TO_LINEAR_PROPHOTO, multiply(D65_TO_D50, xyz())), linearToProphoto);
    case 'rec2020':
      return mapChannels(multiply(XYZ_TO_LINEAR_REC2020, xyz()), linearToRec2020);
    case 'lab':
      return xyzD50ToLab(multiply(D65_TO_D50, xyz()));
    case 'lch':
      return toPolar(xyzD50ToLab(multiply(D65_TO_D50, xyz())), 0.0015);
    case 'hsl':
      return srgbToHsl(rgb);
    case 'hwb':
      return srgbToHwb(rgb);
    case 'oklab':
      return linearSrgbToOklab(linear);
    case 'oklch':
      return toPolar(linearSrgbToOklab(linear), 0.000004);
    case 'xyz-d50':
      return multiply(D65_TO_D50, xyz());
    case 'xyz-d65':
      return xyz();
  }
}

// ---------- 8-bit sRGB ----------

const clampUnit = (v: number) => Math.min(1, Math.max(0, Number.isNaN(v) ? 0 : v));

/** Clip to the sRGB gamut and quantize to 8 bits. */
export function rgbaFromSrgb([r, g, b]: Channels, alpha: number): Rgba {
  const to8 = (v: number) => Math.round(clampUnit(v) * 255);
  return { r: to8(r), g: to8(g), b: to8(b), a: to8(alpha) };
}

export function srgbFromRgba(color: Rgba): { channels: Channels; alpha: number } {
  return { channels: [color.r / 255, color.g / 255, color.b / 255], alpha: color.a / 255 };
}

// ---------- Interpolation ----------

export function normalizeHue(hue: number): number {
  const h = hue % 360;
  return h < 0 ? h + 360 : h;
}

function fixHues(h1: number, h2: number, direction: HueDirection): [number, number] {
  const delta = h2 - h1;
  switch (direction) {
    case 'shorter':
      if (delta > 180) return [h1 + 360, h2];
      if (delta < -180) return [h1, h2 + 360];
      return [h1, h2];
    case 'longer':
      if (delta > 0 && delta < 180) return [h1 + 360, h2];
      if (delta > -180 && delta <= 0) return [h1, h2 + 360];
      return [h1, h2];
    case 'increasing':
      return delta < 0 ? [h1, h2 + 360] : [h1, h2];
    case 'decreasing':
      return delta > 0 ? [h1 + 360, h2] : [h1, h2];
  }
}

/**
 * Interpolate between two colors in `space` at `t` (0–1), with the hue
 * channel (for polar spaces) following `direction`. Returns 8-bit sRGB.
 */
export function interpolate(from: Rgba, to: Rgba, space: ColorSpace, direction: HueDirection, t: number): Rgba {
  const a = srgbFromRgba(from);
  const b = srgbFromRgba(to);
  const c1 = fromSrgb(space, a.channels);
  const c2 = fromSrgb(space, b.channels);
  const hue = hueIndex(space);

  if (hue >= 0) {
    // A powerless hue takes the other color's hue
    if (Number.isNaN(c1[hue])) c1[hue] = c2[hue];
    if (Number.isNaN(c2[hue])) c2[hue] = c1[hue];
    if (Number.isNaN(c1[hue])) {
      c1[hue] = 0;
      c2[hue] = 0;
    }
    [c1[hue], c2[hue]] = fixHues(normalizeHue(c1[hue]), normalizeHue(c2[hue]), direction);
  }

  const alpha = a.alpha + (b.alpha - a.alpha) * t;
  const mixed: Channels = [0, 0, 0];
  for (let i = 0; i < 3; i++) {
    if (i === hue) {
      mixed[i] = normalizeHue(c1[i] + (c2[i] - c1[i]) * t);
      continue;
    }
    // Premultiplied interpolation
    const premultiplied = c1[i] * a.alpha + (c2[i] * b.alpha - c1[i] * a.alpha) * t;
    mixed[i] = alpha === 0 ? 0 : premultiplied / alpha;
  }

  return rgbaFromSrgb(toSrgb(space, mixed), alpha);
}
