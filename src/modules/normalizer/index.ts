// Applied in order, each at most once, anchored at the end of the name.
const CORPORATE_SUFFIXES: RegExp[] = [
    /\s+Inc\.?$/i,
    /\s+LLC\.?$/i,
    /\s+Ltd\.?$/i,
    /\s+Limited$/i,
    /\s+Corp\.?$/i,
    /\s+Corporation$/i,
    /\s+Co\.?$/i,
    /\s+Company$/i,
    /\s+GmbH$/i,
    /\s+S\.A\.?$/i,
    /\s+AG$/i,
    /\s+PLC$/i,
];

export class Normalizer {

    /**
     * Host of a URL or bare domain, lowercased and without a leading "www.".
     * Returns undefined when nothing parseable is left.
     */
    static extractDomain(url?: string): string | undefined {
        if (!url) return undefined;
        let candidate = url.trim();
        if (!candidate) return undefined;
        if (!/^https?:\/\//i.test(candidate)) {
            candidate = `https://${candidate}`;
        }

        let host: string;
        try {
            host = new URL(candidate).hostname.toLowerCase();
        } catch {
            return undefined;
        }

        host = host.replace(/^www\./, '');
        return host || undefined;
    }

    /**
     * Identity domain of a record: its explicit domain if set, else the
     * host of its website.
     */
    static companyDomain(company: { domain?: string; website?: string }): string | undefined {
        if (company.domain) {
            const domain = company.domain.trim().toLowerCase().replace(/^www\./, '');
            if (domain) return domain;
        }
        return this.extractDomain(company.website);
    }

    static cleanText(text: string): string {
        return text
            .split(/\s+/)
            .filter(Boolean)
            .join(' ')
            .replace(/[^\p{L}\p{M}\p{N}_\s\-.,!?()&]/gu, '')
            .trim();
    }

    /** Company name without legal suffixes or symbol noise, original casing. */
    static cleanCompanyName(name: string): string {
        if (!name) return '';
        let cleaned = name.trim();
        for (const suffix of CORPORATE_SUFFIXES) {
            cleaned = cleaned.replace(suffix, '');
        }
        return this.cleanText(cleaned);
    }

    /** Comparison key used by the deduper. */
    static normalizeCompany(name: string): string {
        return this.cleanCompanyName(name).toLowerCase();
    }
}
