import { ZodError } from 'zod';

/**
 * Thrown when a terrain grid handed to the terrain oracle is empty or ragged.
 */
export class GridShapeError extends Error {
    constructor(
        message: string,
        public row?: number,
        public expectedWidth?: number,
        public actualWidth?: number
    ) {
        super(message);
        this.name = 'GridShapeError';
    }

    toString(): string {
        let msg = this.message;
        if (this.row !== undefined) {
            msg = `Row ${this.row}: ${msg}`;
        }
        if (this.expectedWidth !== undefined && this.actualWidth !== undefined) {
            msg += ` (expected ${this.expectedWidth} cells, got ${this.actualWidth})`;
        }
        return msg;
    }
}

/**
 * Thrown when spatial configuration (overrides or TIDEWATCH_* environment
 * variables) fails validation.
 */
export class SpatialConfigError extends Error {
    constructor(
        message: string,
        public issues: string[] = []
    ) {
        super(message);
        this.name = 'SpatialConfigError';
    }

    static fromZod(error: ZodError, source: string): SpatialConfigError {
        const issues = error.issues.map(issue => {
            const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
            return `${path}: ${issue.message}`;
        });
        return new SpatialConfigError(`Invalid spatial configuration from ${source}`, issues);
    }

    toString(): string {
        if (this.issues.length === 0) {
            return this.message;
        }
        return `${this.message}:\n  - ${this.issues.join('\n  - ')}`;
    }
}

/**
 * Thrown by the occupancy index for a duplicate id or an entity it cannot
 * place (bad coordinate or bearing). The index is left unchanged.
 */
export class OccupancyError extends Error {
    constructor(
        message: string,
        public entityId: string
    ) {
        super(message);
        this.name = 'OccupancyError';
    }

    toString(): string {
        return `${this.name} [${this.entityId}]: ${this.message}`;
    }
}
