/**
 * Scene Serializer — save/load trace scenes as plain text.
 *
 * Format: one block per entry, separated by blank lines.
 * Lines starting with # are comments.
 * Each block starts with [Type] and lists key = value pairs:
 *
 *   [Settings]   wavelength
 *   [Mirror]     name, aperture, position = x, y, theta
 *   [Ray]        state = x, y, angle
 *
 * Numbers are written at full precision, so a saved scene traces exactly
 * like the original. Names escape backslash, CR and LF as \\, \r and \n;
 * an empty `name =` marks an unlabelled element.
 */

import { DEFAULT_WAVELENGTH } from '../physics/types';
import type { Point2, RayState, TraceScene } from '../physics/types';
import type { OpticalElement } from '../physics/OpticalElement';
import { DEFAULT_APERTURE, createElement, getTypeName } from '../physics/ElementRegistry';
import { InvalidRayError } from '../physics/errors';

export function serializeScene(scene: TraceScene): string {
    const lines: string[] = ['# Ray trace scene', ''];

    lines.push('[Settings]', `wavelength = ${scene.wavelength}`, '');

    for (const element of scene.elements) {
        const typeName = getTypeName(element);
        if (!typeName) {
            console.warn(`Scene: Element "${element.name ?? element.id}" has no registered type, skipping`);
            continue;
        }

        lines.push(`[${typeName}]`);
        writeElementProps(element, lines);
        lines.push('');
    }

    for (const ray of scene.rays) {
        lines.push('[Ray]', `state = ${ray.join(', ')}`, '');
    }

    return lines.join('\n');
}

function writeElementProps(element: OpticalElement, lines: string[]) {
    const p = element.position;
    lines.push(
        `name = ${element.name === undefined ? '' : escapeText(element.name)}`,
        `aperture = ${element.aperture}`,
        `position = ${p.x}, ${p.y}`,
        `theta = ${element.theta}`
    );
}

function escapeText(text: string): string {
    return text.replace(/[\\\r\n]/g, ch => (ch === '\n' ? '\\n' : ch === '\r' ? '\\r' : '\\\\'));
}

function unescapeText(text: string): string {
    return text.replace(/\\(.)/g, (_, ch: string) => (ch === 'n' ? '\n' : ch === 'r' ? '\r' : ch));
}

/** One `[Type]` section. `line` is the 1-based line of its header. */
interface Block {
    type: string;
    line: number;
    props: Map<string, string>;
}

export function deserializeScene(text: string): TraceScene {
    const scene: TraceScene = { elements: [], rays: [], wavelength: DEFAULT_WAVELENGTH };

    for (const block of readBlocks(text)) {
        if (block.type === 'Settings') {
            scene.wavelength = readNumber(block, 'wavelength', DEFAULT_WAVELENGTH);
        } else if (block.type === 'Ray') {
            scene.rays.push(readRay(block, scene.rays.length));
        } else {
            const element = createElement(block.type, {
                aperture: readNumber(block, 'aperture', DEFAULT_APERTURE),
                position: readPosition(block),
                theta: readNumber(block, 'theta', 0),
                name: readName(block),
            });
            if (!element) {
                console.warn(`Scene: Unknown block type "${block.type}" at line ${block.line}, skipping`);
                continue;
            }
            scene.elements.push(element);
        }
    }

    return scene;
}

const HEADER = /^\[(\w+)\]$/;

function readBlocks(text: string): Block[] {
    const blocks: Block[] = [];
    let current: Block | null = null;

    text.split(/\r?\n/).forEach((raw, i) => {
        const line = raw.trim();
        if (line.startsWith('#')) return;

        const header = HEADER.exec(line);
        if (header) {
            current = { type: header[1], line: i + 1, props: new Map() };
            blocks.push(current);
        } else if (line === '') {
            current = null;
        } else if (current) {
            const eq = line.indexOf('=');
            if (eq > 0) current.props.set(line.slice(0, eq).trim(), line.slice(eq + 1).trim());
        }
    });

    return blocks;
}

function readNumber(block: Block, key: string, fallback: number): number {
    const value = parseFloat(block.props.get(key) ?? '');
    return Number.isNaN(value) ? fallback : value;
}

function readName(block: Block): string | null | undefined {
    const raw = block.props.get('name');
    if (raw === undefined) return undefined;
    return raw === '' ? null : unescapeText(raw);
}

function readPosition(block: Block): Point2 {
    const [x = NaN, y = NaN] = (block.props.get('position') ?? '').split(',').map(parseFloat);
    return {
        x: Number.isFinite(x) ? x : 0,
        y: Number.isFinite(y) ? y : 0,
    };
}

/** Parses `state = x, y, angle`. NaN and ±Infinity are accepted in any component. */
function readRay(block: Block, index: number): RayState {
    const raw = block.props.get('state');
    if (raw === undefined) {
        throw new InvalidRayError(index, `missing "state = x, y, angle" (line ${block.line})`);
    }

    const tokens = raw.split(',').map(s => s.trim());
    if (tokens.length !== 3) {
        throw new InvalidRayError(index, `expected 3 components, got ${tokens.length}`);
    }

    const values = tokens.map(Number);
    const bad = tokens.findIndex((t, i) => t === '' || (Number.isNaN(values[i]) && t !== 'NaN'));
    if (bad !== -1) {
        throw new InvalidRayError(index, `component ${bad + 1} is not a number: "${tokens[bad]}"`);
    }

    return [values[0], values[1], values[2]];
}
