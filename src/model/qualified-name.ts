/**
 * @file qualified-name.ts
 * @module model/qualified-name
 * @created 2026-10-12
 * @license MIT
 *
 * @fileoverview Splitting and normalizing qualified names across languages.
 */

/**
 * Split a qualified name into its scope segments.
 *
 * `::`, `.` and `/` all separate segments, so `geo::Point`, `geo.Point` and
 * `geo/Point` compare equal. Template arguments and call parentheses are
 * dropped: `std::vector<geo::Point>` yields `["std", "vector"]`.
 *
 * @example
 * splitQualifiedName('geo::Shape::area()')
 * // Returns: ['geo', 'Shape', 'area']
 */
export function splitQualifiedName(name: string): string[] {
    const segments: string[] = [];
    let current = '';
    let depth = 0;

    for (let i = 0; i < name.length; i++) {
        const char = name[i];

        if (char === '<' || char === '(' || char === '[') {
            depth++;
            continue;
        }
        if (char === '>' || char === ')' || char === ']') {
            depth = Math.max(0, depth - 1);
            continue;
        }
        if (depth > 0) continue;

        if (char === ':' && name[i + 1] === ':') {
            segments.push(current);
            current = '';
            i++;
        } else if (char === '.' || char === '/') {
            segments.push(current);
            current = '';
        } else {
            current += char;
        }
    }
    segments.push(current);

    return segments.map(s => s.trim()).filter(s => s.length > 0);
}

/**
 * Lookup key for a qualified name: its segments joined with `.`.
 */
export function nameKey(name: string): string {
    return splitQualifiedName(name).join('.');
}

/**
 * Lookup key for a sequence of segments.
 */
export function segmentsKey(segments: readonly string[]): string {
    return segments.join('.');
}
