/**
 * Sentence-boundary text splitter with overlap.
 *
 * Text is cut into sentences (and lines), which are packed greedily into
 * chunks of at most chunkSize characters. Each new chunk starts with the
 * trailing sentences of the previous one, up to chunkOverlap characters.
 * A sentence longer than chunkSize is split on words, and a word longer
 * than chunkSize on characters.
 */

export interface SplitterOptions {
	chunkSize: number;
	chunkOverlap: number;
}

export interface Unit {
	text: string;
	/** Joins this unit to the following one */
	separator: string;
}

const SENTENCE_BOUNDARY = /(?<=[.!?])[ \t]+|[ \t]*\n\s*/g;

export function splitText(text: string, options: SplitterOptions): string[] {
	const {chunkSize, chunkOverlap} = options;
	const units = splitSentences(text).flatMap(unit =>
		unit.text.length > chunkSize ? splitLongUnit(unit, chunkSize) : [unit],
	);

	const chunks: string[] = [];
	let current: Unit[] = [];

	for (const unit of units) {
		if (current.length > 0 && joinedLength([...current, unit]) > chunkSize) {
			chunks.push(joinUnits(current));

			let overlap: Unit[] = [];
			for (let i = current.length - 1; i >= 0; i--) {
				const candidate = current[i];
				if (!candidate) break;
				if (joinedLength([candidate, ...overlap]) > chunkOverlap) break;
				overlap = [candidate, ...overlap];
			}
			while (overlap.length > 0 && joinedLength([...overlap, unit]) > chunkSize) {
				overlap = overlap.slice(1);
			}
			current = overlap;
		}
		current.push(unit);
	}

	if (current.length > 0) {
		chunks.push(joinUnits(current));
	}

	return chunks;
}

/**
 * Sentences end at . ! or ? followed by whitespace; line breaks also end a
 * unit and are kept as its separator.
 */
export function splitSentences(text: string): Unit[] {
	const units: Unit[] = [];
	let start = 0;

	for (const match of text.matchAll(SENTENCE_BOUNDARY)) {
		const index = match.index ?? 0;
		const piece = text.slice(start, index).trim();
		if (piece.length > 0) {
			units.push({
				text: piece,
				separator: match[0].includes('\n') ? '\n' : ' ',
			});
		}
		start = index + match[0].length;
	}

	const tail = text.slice(start).trim();
	if (tail.length > 0) {
		units.push({text: tail, separator: ' '});
	}

	return units;
}

function splitLongUnit(unit: Unit, chunkSize: number): Unit[] {
	const pieces: string[] = [];
	let current = '';

	for (const word of unit.text.split(/\s+/)) {
		if (word.length > chunkSize) {
			if (current) pieces.push(current);
			current = '';
			for (let i = 0; i < word.length; i += chunkSize) {
				pieces.push(word.slice(i, i + chunkSize));
			}
			continue;
		}
		const candidate = current ? `${current} ${word}` : word;
		if (candidate.length > chunkSize) {
			pieces.push(current);
			current = word;
		} else {
			current = candidate;
		}
	}
	if (current) pieces.push(current);

	return pieces.map((text, index) => ({
		text,
		separator: index === pieces.length - 1 ? unit.separator : ' ',
	}));
}

function joinedLength(units: Unit[]): number {
	return units.reduce(
		(sum, unit, index) =>
			sum + unit.text.length + (index > 0 ? (units[index - 1]?.separator.length ?? 0) : 0),
		0,
	);
}

function joinUnits(units: Unit[]): string {
	return units
		.map((unit, index) =>
			index < units.length - 1 ? unit.text + unit.separator : unit.text,
		)
		.join('');
}
