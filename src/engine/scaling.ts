import type { ScalableFeature, ScalingBreakpoint } from "./types";

const PLACEHOLDER_PATTERN = /\{([^{}]+)\}/g;

/**
 * Value of the breakpoint with the largest `minLevel` at or below `level`.
 * Breakpoints are scanned in ascending `minLevel` order (stable for ties),
 * so the last qualifying entry wins.
 */
export function valueAt(breakpoints: readonly ScalingBreakpoint[], level: number): string | undefined {
    const ordered = [...breakpoints].sort((a, b) => a.minLevel - b.minLevel);
    let current: string | undefined;
    for (const breakpoint of ordered) {
        if (breakpoint.minLevel > level) break;
        current = breakpoint.value;
    }
    return current;
}

export function scaledNumber(breakpoints: readonly ScalingBreakpoint[], level: number): number | undefined {
    const value = valueAt(breakpoints, level);
    if (value === undefined) return undefined;
    const n = Number(value);
    return Number.isFinite(n) ? n : undefined;
}

/**
 * Renders a feature description for a character level. Placeholders that
 * name no scaling entry, or whose entry has no breakpoint at or below the
 * level, stay in the text as written. Substitution is a single pass, so a
 * substituted value is never scanned for placeholders itself.
 */
export function resolveScaling(feature: string | ScalableFeature, level: number): string {
    if (typeof feature === "string") return feature;
    const scaling = feature.scaling;
    if (!scaling || Object.keys(scaling).length === 0) return feature.description;
    return feature.description.replace(PLACEHOLDER_PATTERN, (token: string, name: string) => {
        if (!Object.hasOwn(scaling, name)) return token;
        return valueAt(scaling[name], level) ?? token;
    });
}
