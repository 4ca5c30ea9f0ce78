import { SignalMatch } from '../models/SourceFile';
import { SignalSummary } from '../models/AnalysisResult';

function sorted(values: Iterable<string>): string[] {
    return [...values].sort();
}

/**
 * Aggregates per-file signals into category -> value -> files
 */
export class SignalIndex {
    private readonly entries = new Map<string, Map<string, Set<string>>>();

    add(signal: SignalMatch): void {
        let values = this.entries.get(signal.category);
        if (!values) {
            values = new Map();
            this.entries.set(signal.category, values);
        }
        let files = values.get(signal.value);
        if (!files) {
            files = new Set();
            values.set(signal.value, files);
        }
        files.add(signal.file);
    }

    addAll(signals: Iterable<SignalMatch>): void {
        for (const signal of signals) this.add(signal);
    }

    categories(): string[] {
        return sorted(this.entries.keys());
    }

    /**
     * Values of a category, most widespread first
     */
    values(category: string): string[] {
        const values = this.entries.get(category);
        if (!values) return [];
        return sorted(values.keys()).sort((a, b) => this.files(category, b).length - this.files(category, a).length);
    }

    files(category: string, value: string): string[] {
        return sorted(this.entries.get(category)?.get(value) ?? []);
    }

    toJSON(): SignalSummary {
        const summary: SignalSummary = {};
        for (const category of this.categories()) {
            summary[category] = {};
            for (const value of sorted(this.entries.get(category)?.keys() ?? [])) {
                summary[category][value] = this.files(category, value);
            }
        }
        return summary;
    }
}
