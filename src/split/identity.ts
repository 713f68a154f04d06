/**
 * @file Card Identity Extractor
 *
 * Recovers the structured identity embedded in a scan's file stem:
 *
 *   RG123456789_part4-+12345678-+front_laser
 *   └ order id ┘└ any ┘ └ cert ┘  └ orientation ┘
 *
 * The order id is `RG` plus exactly nine digits; anything up to the
 * first `-+` may follow it as long as the digit run itself is not
 * longer. The certificate id is exactly eight digits and identifies the
 * physical card, so every scan of one card shares it.
 *
 * @module split/identity
 */

import { IdentityFormatError } from '../dataset/errors.js';

export type CardOrientation = 'front' | 'back';

export interface CardIdentity {
    readonly orderId: string;
    readonly certificateId: string;
    readonly orientation: CardOrientation;
}

const IDENTITY_PATTERN: RegExp = /^(RG\d{9})(?!\d)[^+]*-\+(\d{8})-\+(front|back)_laser$/;

/**
 * Parse a stem into its card identity.
 *
 * @throws IdentityFormatError when the stem does not match the pattern
 */
export function identity_extract(stem: string): CardIdentity {
    const match: RegExpExecArray | null = IDENTITY_PATTERN.exec(stem);
    if (!match) {
        throw new IdentityFormatError(stem);
    }
    const [, orderId, certificateId, orientation] = match;
    return Object.freeze({
        orderId,
        certificateId,
        orientation: orientation === 'front' ? 'front' : 'back',
    });
}
