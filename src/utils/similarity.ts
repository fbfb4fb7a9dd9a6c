type MatchBlock = { a: number; b: number; size: number };

export class StringUtils {

    /**
     * Gestalt pattern matching (Ratcliff/Obershelp) ratio in [0, 1]:
     * 2 * matched characters / total characters. Two empty strings score 1.
     */
    static similarityRatio(s1: string, s2: string): number {
        const total = s1.length + s2.length;
        if (total === 0) return 1;
        return (2 * this.matchingCharacters(s1, s2)) / total;
    }

    static matchingCharacters(s1: string, s2: string): number {
        let matched = 0;
        const queue: Array<[number, number, number, number]> = [[0, s1.length, 0, s2.length]];

        for (let range = queue.pop(); range; range = queue.pop()) {
            const [alo, ahi, blo, bhi] = range;
            const block = this.longestMatch(s1, s2, alo, ahi, blo, bhi);
            if (block.size === 0) continue;

            matched += block.size;
            if (alo < block.a && blo < block.b) {
                queue.push([alo, block.a, blo, block.b]);
            }
            if (block.a + block.size < ahi && block.b + block.size < bhi) {
                queue.push([block.a + block.size, ahi, block.b + block.size, bhi]);
            }
        }

        return matched;
    }

    /**
     * Longest common substring of s1[alo:ahi] and s2[blo:bhi]. On ties the
     * block starting earliest in s1, then earliest in s2, wins.
     */
    private static longestMatch(s1: string, s2: string, alo: number, ahi: number, blo: number, bhi: number): MatchBlock {
        let best: MatchBlock = { a: alo, b: blo, size: 0 };
        // lengths[j] = length of the common run ending at s1[i - 1], s2[j - 1]
        let lengths = new Map<number, number>();

        for (let i = alo; i < ahi; i++) {
            const next = new Map<number, number>();
            for (let j = blo; j < bhi; j++) {
                if (s1[i] !== s2[j]) continue;
                const size = (lengths.get(j - 1) ?? 0) + 1;
                next.set(j, size);
                if (size > best.size) {
                    best = { a: i - size + 1, b: j - size + 1, size };
                }
            }
            lengths = next;
        }

        return best;
    }
}
