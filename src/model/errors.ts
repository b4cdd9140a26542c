/**
 * @file errors.ts
 * @module model/errors
 * @created 2026-10-12
 * @license MIT
 *
 * @fileoverview Error types raised while building the element graph and generating documents.
 */

/**
 * Base class for fatal problems in the extractor input.
 * No partial graph is usable after one of these.
 */
export class GraphConstructionError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'GraphConstructionError';
    }
}

/**
 * Two records share the same element id.
 */
export class DuplicateElementError extends GraphConstructionError {
    readonly elementId: string;

    constructor(elementId: string) {
        super(`Duplicate element id: ${elementId}`);
        this.name = 'DuplicateElementError';
        this.elementId = elementId;
    }
}

/**
 * A record is structurally invalid or conflicts with other records.
 */
export class MalformedInputError extends GraphConstructionError {
    /** Id of the offending record, when known */
    readonly elementId?: string;

    constructor(message: string, elementId?: string) {
        super(elementId ? `${message} (element ${elementId})` : message);
        this.name = 'MalformedInputError';
        this.elementId = elementId;
    }
}

/**
 * The signature formatter failed for one element.
 * Recoverable: the driver substitutes a placeholder fragment.
 */
export class FormattingError extends Error {
    readonly elementId: string;

    constructor(elementId: string, reason: string, options?: { cause?: unknown }) {
        super(reason, options);
        this.name = 'FormattingError';
        this.elementId = elementId;
    }
}

/**
 * End-of-run consistency problem, raised only when warnings are errors.
 */
export class ConsistencyError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConsistencyError';
    }
}

/**
 * Insertion requested on a tracker whose run already finished.
 */
export class TrackerClosedError extends Error {
    constructor() {
        super('Insertion tracker is closed: its generation run has finished');
        this.name = 'TrackerClosedError';
    }
}

/**
 * A named anchor was registered twice in one generation run.
 */
export class DuplicateAnchorError extends Error {
    readonly anchorName: string;

    constructor(anchorName: string, firstDocumentId: string, secondDocumentId: string) {
        super(`Anchor "${anchorName}" is defined in both ${firstDocumentId} and ${secondDocumentId}`);
        this.name = 'DuplicateAnchorError';
        this.anchorName = anchorName;
    }
}

/**
 * A link names an anchor that no document defines.
 */
export class UnknownAnchorError extends Error {
    readonly anchorName: string;

    constructor(anchorName: string) {
        super(`Unknown anchor "${anchorName}"`);
        this.name = 'UnknownAnchorError';
        this.anchorName = anchorName;
    }
}

/**
 * Malformed document-set configuration.
 */
export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}
