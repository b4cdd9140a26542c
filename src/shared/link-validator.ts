/**
 * @file link-validator.ts
 * @module shared/link-validator
 * @created 2026-10-16
 * @license MIT
 *
 * @fileoverview Validates internal links and anchors in generated Markdown.
 */

import { existsSync, readdirSync, readFileSync } from 'node:fs';
import { resolve, dirname, join, relative } from 'node:path';

/**
 * Why a link is broken.
 */
export type BrokenLinkReason = 'missing-file' | 'missing-anchor';

/**
 * Represents a broken link found during validation.
 */
export interface BrokenLink {
    /** Path of the file containing the link, relative to the output directory */
    sourceFile: string;
    /** The link text (what appears between [ and ]) */
    linkText: string;
    /** The link target (what appears between ( and )) */
    linkPath: string;
    reason: BrokenLinkReason;
}

/**
 * Results from link validation.
 */
export interface ValidationResult {
    /** Number of Markdown files scanned */
    filesScanned: number;
    /** Total number of internal links found */
    totalLinks: number;
    /** Number of valid links (file and anchor exist) */
    validLinks: number;
    brokenLinks: BrokenLink[];
    /** Links with absolute paths (should be relative) */
    absoluteLinks: Array<{ file: string; link: string }>;
}

const LINK_PATTERN = /\[((?:\\.|[^\]\\])*)\]\(([^)\s]+)\)/g;
const ANCHOR_PATTERN = /<a id="([^"]*)"><\/a>/g;

/**
 * Find all Markdown files in a directory tree.
 *
 * Uses an explicit stack rather than recursion.
 *
 * @param dir - Directory to search
 * @returns Absolute paths of Markdown files, sorted
 */
function findMarkdownFiles(dir: string): string[] {
    const files: string[] = [];
    if (!existsSync(dir)) return files;

    const stack: string[] = [dir];
    let currentDir: string | undefined;
    while ((currentDir = stack.pop()) !== undefined) {
        for (const entry of readdirSync(currentDir, { withFileTypes: true })) {
            const fullPath = join(currentDir, entry.name);
            if (entry.isDirectory()) {
                stack.push(fullPath);
            } else if (entry.name.endsWith('.md')) {
                files.push(resolve(fullPath));
            }
        }
    }

    return files.sort();
}

/**
 * Extract Markdown links from content.
 *
 * @param content - Markdown content to scan
 * @returns Link text and target pairs in document order
 */
export function extractLinks(content: string): Array<{ text: string; path: string }> {
    const links: Array<{ text: string; path: string }> = [];
    for (const match of content.matchAll(LINK_PATTERN)) {
        links.push({ text: match[1], path: match[2] });
    }
    return links;
}

/**
 * Collect the `<a id="...">` anchors of a document.
 */
export function extractAnchors(content: string): Set<string> {
    const anchors = new Set<string>();
    for (const match of content.matchAll(ANCHOR_PATTERN)) {
        anchors.add(unescapeAttribute(match[1]));
    }
    return anchors;
}

function unescapeAttribute(value: string): string {
    return value.replace(/&quot;/g, '"').replace(/&lt;/g, '<').replace(/&gt;/g, '>').replace(/&amp;/g, '&');
}

function isInternal(path: string): boolean {
    return path.startsWith('#') || /\.md(#|$)/.test(path);
}

function decodeFragment(fragment: string): string {
    try {
        return decodeURIComponent(fragment);
    } catch {
        // Malformed escapes cannot match an anchor; compare the raw text
        return fragment;
    }
}

/**
 * Validate all internal links in Markdown files.
 *
 * Checks that each `file.md` target exists relative to the linking file and
 * that each `#anchor` (same-file or cross-file) names an anchor in the target.
 *
 * @param outputDir - Directory containing Markdown files
 * @param verbose - Whether to print progress
 * @returns Validation results
 */
export function validateLinks(outputDir: string, verbose: boolean = false): ValidationResult {
    const mdFiles = findMarkdownFiles(outputDir);
    if (verbose) {
        console.log(`  Found ${mdFiles.length.toLocaleString()} markdown files`);
    }

    const contents = new Map<string, string>();
    for (const file of mdFiles) {
        contents.set(file, readFileSync(file, 'utf-8'));
    }
    const anchorCache = new Map<string, Set<string>>();
    const anchorsOf = (file: string): Set<string> => {
        let anchors = anchorCache.get(file);
        if (!anchors) {
            anchors = extractAnchors(contents.get(file) ?? '');
            anchorCache.set(file, anchors);
        }
        return anchors;
    };

    const brokenLinks: BrokenLink[] = [];
    const absoluteLinks: Array<{ file: string; link: string }> = [];
    let totalLinks = 0;
    let validLinks = 0;

    for (const [mdFile, content] of contents) {
        const sourceFile = relative(outputDir, mdFile);

        for (const link of extractLinks(content)) {
            if (!isInternal(link.path)) continue;
            totalLinks++;

            if (link.path.startsWith('/')) {
                absoluteLinks.push({ file: sourceFile, link: link.path });
                continue;
            }

            const hashAt = link.path.indexOf('#');
            const filePart = hashAt === -1 ? link.path : link.path.slice(0, hashAt);
            const fragment = hashAt === -1 ? undefined : link.path.slice(hashAt + 1);
            const target = filePart ? resolve(dirname(mdFile), filePart) : mdFile;

            if (!contents.has(target)) {
                brokenLinks.push({ sourceFile, linkText: link.text, linkPath: link.path, reason: 'missing-file' });
            } else if (fragment !== undefined && !anchorsOf(target).has(decodeFragment(fragment))) {
                brokenLinks.push({ sourceFile, linkText: link.text, linkPath: link.path, reason: 'missing-anchor' });
            } else {
                validLinks++;
            }
        }
    }

    return { filesScanned: mdFiles.length, totalLinks, validLinks, brokenLinks, absoluteLinks };
}

/**
 * Print validation results to console.
 *
 * @param results - Validation results to print
 */
export function printValidationResults(results: ValidationResult): void {
    console.log('\n=== Link Validation Results ===\n');
    console.log(`Files scanned: ${results.filesScanned.toLocaleString()}`);
    console.log(`Total links: ${results.totalLinks.toLocaleString()}`);
    console.log(`  Valid: ${results.validLinks.toLocaleString()}`);
    console.log(`  Broken: ${results.brokenLinks.length.toLocaleString()}`);

    if (results.absoluteLinks.length > 0) {
        console.log(`  Absolute (should be relative): ${results.absoluteLinks.length}`);
    }

    if (results.brokenLinks.length > 0) {
        console.log(`\n=== Broken Links (first 100 of ${results.brokenLinks.length}) ===\n`);
        for (const link of results.brokenLinks.slice(0, 100)) {
            const why = link.reason === 'missing-file' ? 'file not found' : 'anchor not found';
            console.log(`  ${link.sourceFile}: [${link.linkText}](${link.linkPath}) ${why}`);
        }
    }

    for (const { file, link } of results.absoluteLinks.slice(0, 20)) {
        console.log(`  ${file}: ${link}`);
    }

    console.log('');
    if (results.brokenLinks.length > 0 || results.absoluteLinks.length > 0) {
        console.log('VALIDATION: ISSUES FOUND');
    } else {
        console.log('VALIDATION: PASSED');
        console.log(`All ${results.validLinks.toLocaleString()} links are valid.`);
    }
}
