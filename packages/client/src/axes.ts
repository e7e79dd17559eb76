import { AxisMismatchError } from '@cutout/core';
import { BoxND, type boxND } from '@cutout/geometry';
import type { AxisLabel, VolumeMetadata } from './metadata';

/**
 * A bijection between the client-facing (canonical, channel-first) axis order and the order in which
 * axes are laid out in the binary payload (the wire order, row-major: its last axis varies fastest).
 */
export type AxisOrderMapping = {
    readonly canonical: ReadonlyArray<AxisLabel>;
    readonly wire: ReadonlyArray<AxisLabel>;
    // wire axis i is canonical axis wireFromCanonical[i]
    readonly wireFromCanonical: ReadonlyArray<number>;
    // canonical axis i is wire axis canonicalFromWire[i]
    readonly canonicalFromWire: ReadonlyArray<number>;
};

/**
 * @param canonical axis labels in client order, eg. ['c', 'x', 'y', 'z']
 * @param wire the same labels in payload order. Defaults to the reverse of the canonical order, so that
 * the channel varies fastest in the payload, followed by x, then y, and so on.
 * @throws AxisMismatchError if the two label lists are not permutations of the same set of unique labels
 */
export function createAxisMapping(
    canonical: ReadonlyArray<AxisLabel>,
    wire: ReadonlyArray<AxisLabel> = [...canonical].reverse(),
): AxisOrderMapping {
    if (new Set(canonical).size !== canonical.length) {
        throw new AxisMismatchError(`axis labels must be unique: "${canonical.join('')}"`);
    }
    if (wire.length !== canonical.length || new Set(wire).size !== wire.length) {
        throw new AxisMismatchError(`"${wire.join('')}" is not a reordering of "${canonical.join('')}"`);
    }
    const wireFromCanonical = wire.map((label) => canonical.indexOf(label));
    if (wireFromCanonical.some((i) => i < 0)) {
        throw new AxisMismatchError(`"${wire.join('')}" is not a reordering of "${canonical.join('')}"`);
    }
    const canonicalFromWire = canonical.map((label) => wire.indexOf(label));
    return { canonical: [...canonical], wire: [...wire], wireFromCanonical, canonicalFromWire };
}

/**
 * the default mapping for a volume: its own labels, reversed on the wire
 */
export function axisMappingFor(metadata: VolumeMetadata): AxisOrderMapping {
    return createAxisMapping(metadata.axisLabels);
}

export function isIdentityMapping(mapping: AxisOrderMapping): boolean {
    return mapping.wireFromCanonical.every((from, i) => from === i);
}

function checkRank(rank: number, mapping: AxisOrderMapping) {
    if (rank !== mapping.canonical.length) {
        throw new AxisMismatchError(
            `expected ${mapping.canonical.length} axes (${mapping.canonical.join('')}), got ${rank}`,
        );
    }
}

export function permuteToWire<T>(values: ReadonlyArray<T>, mapping: AxisOrderMapping): T[] {
    checkRank(values.length, mapping);
    return mapping.wireFromCanonical.map((from) => values[from]);
}

export function permuteToCanonical<T>(values: ReadonlyArray<T>, mapping: AxisOrderMapping): T[] {
    checkRank(values.length, mapping);
    return mapping.canonicalFromWire.map((from) => values[from]);
}

export function toWireOrder(box: boxND, mapping: AxisOrderMapping): boxND {
    checkRank(BoxND.rank(box), mapping);
    return BoxND.permute(box, mapping.wireFromCanonical);
}

export function toCanonicalOrder(box: boxND, mapping: AxisOrderMapping): boxND {
    checkRank(BoxND.rank(box), mapping);
    return BoxND.permute(box, mapping.canonicalFromWire);
}

/**
 * @returns row-major byte strides for an array of the given shape: the last axis is the fastest-varying
 * @example computeStrides([4, 3, 2], 2) // [12, 4, 2]
 */
export function computeStrides(shape: ReadonlyArray<number>, dtypeSize: number): number[] {
    const strides = new Array<number>(shape.length);
    let stride = dtypeSize;
    for (let i = shape.length - 1; i >= 0; i -= 1) {
        strides[i] = stride;
        stride *= shape[i];
    }
    return strides;
}
