/**
 * Text with diacritics removed, plus where each remaining character came
 * from in the original string.
 */
export interface FoldedText {
	folded: string;
	/**
	 * Original offset of each folded code unit; one extra entry holds the
	 * original length.
	 */
	offsets: number[];
}

/**
 * Strip combining marks after canonical decomposition: "attività" becomes
 * "attivita". Case is left alone.
 */
export function foldAccents(text: string): string {
	return text.normalize('NFD').replace(/\p{M}/gu, '');
}

/**
 * Fold code point by code point, keeping an offset map back into `text`.
 */
export function foldWithOffsets(text: string): FoldedText {
	let folded = '';
	const offsets: number[] = [];
	let index = 0;
	for (const char of text) {
		const piece = foldAccents(char);
		for (let unit = 0; unit < piece.length; unit++) {
			offsets.push(index);
		}
		folded += piece;
		index += char.length;
	}
	offsets.push(text.length);
	return {folded, offsets};
}
