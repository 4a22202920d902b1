// fontfold/src/lib/naming.ts
// Canonical names for delivered artifacts.

import { basename, extname } from 'node:path';

export interface FamilyNames {
    readonly family: string;
    readonly subfamily: string;
    readonly fullName: string;
    readonly postScriptName: string;
    readonly typographicFamily: string;
    readonly typographicSubfamily: string;
}

/**
 * Name records for one family style.
 *
 * familyNames('Fold HK', 'Bold')
 *   => { family: 'Fold HK', subfamily: 'Bold', fullName: 'Fold HK Bold',
 *        postScriptName: 'FoldHK-Bold', ... }
 */
export function familyNames(family: string, style: string): FamilyNames {
    return {
        family,
        subfamily: style,
        fullName: style === 'Regular' ? family : `${family} ${style}`,
        postScriptName: `${family.replace(/\s+/g, '')}-${style}`,
        typographicFamily: family,
        typographicSubfamily: style,
    };
}

/** `{FamilySlug}-{StyleName}.{ext}` */
export function canonicalFileName(slug: string, style: string, extension: string): string {
    return `${slug}-${style}.${extension}`;
}

const STYLE_SUFFIX = /-(Regular|Bold|Italic|Light|Medium|Thin|Black|SemiBold|ExtraBold)$/;

/**
 * Base name of a source file without axis tags or style suffix.
 *
 * stripAxisTags('NotoSans[wdth,wght].ttf')     => 'NotoSans'
 * stripAxisTags('fonts/Symbols2-Regular.ttf')  => 'Symbols2'
 */
export function stripAxisTags(path: string): string {
    const file = basename(path);
    return file
        .slice(0, file.length - extname(file).length)
        .replace(/\[[^\]]+\]/g, '')
        .replace(STYLE_SUFFIX, '');
}
