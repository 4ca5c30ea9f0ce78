import { ProfileDocument, ProfileSection } from '../models/Profile';

/**
 * A profile section that can be rendered with fewer items when space runs out
 */
export interface SectionSource {
    id: string;
    title: string;
    /** Always rendered in full; `render` then produces the whole text, heading included */
    mandatory?: boolean;
    /** Items available; 0 means there is nothing to report */
    total: number;
    /** Most items ever shown */
    limit: number;
    /** Render the section even with no items */
    keepEmpty?: boolean;
    render(count: number): string[];
}

export function sectionHeading(title: string, shown: number, total: number): string {
    return shown < total ? `## ${title} (showing ${shown} of ${total})` : `## ${title} (${total})`;
}

/**
 * Names the omitted sections, or only counts them when the names would not fit in `room`
 */
export function omittedFooter(titles: string[], room = Infinity): string {
    if (titles.length === 0) return '';
    const named = `Omitted for budget: ${titles.join(', ')}\n`;
    const counted = `Omitted for budget: ${titles.length} section${titles.length === 1 ? '' : 's'}\n`;
    return named.length <= room || named.length <= counted.length ? named : counted;
}

function renderSection(source: SectionSource, count: number): ProfileSection {
    const lines = source.mandatory
        ? source.render(count)
        : [sectionHeading(source.title, count, source.total), ...source.render(count)];
    const text = `${lines.join('\n')}\n\n`;
    const section: ProfileSection = { id: source.id, title: source.title, text, chars: text.length };
    if (!source.mandatory && count < source.total) {
        section.truncation = { shown: count, total: source.total };
    }
    return section;
}

/**
 * Lay sections out in priority order under a character budget.
 *
 * Each section shrinks its item count until it fits; a section that cannot show
 * a single item is named in the footer instead.
 */
export function fitDocument(title: string, sources: SectionSource[], budget: number): ProfileDocument {
    const placed: Array<{ index: number; section: ProfileSection }> = [];
    const omitted: number[] = [];
    let used = 0;

    // The shorter of the two footer forms; the named one is used at the end if it still fits
    const footerLength = () => omittedFooter(omitted.map(index => sources[index].title), 0).length;

    sources.forEach((source, index) => {
        if (source.mandatory) {
            const section = renderSection(source, 0);
            placed.push({ index, section });
            used += section.chars;
            return;
        }
        if (source.total === 0 && !source.keepEmpty) return;

        const room = budget - used - footerLength();
        const least = source.total === 0 ? 0 : 1;
        for (let count = Math.min(source.limit, source.total); count >= least; count--) {
            const section = renderSection(source, count);
            if (section.chars <= room) {
                placed.push({ index, section });
                used += section.chars;
                return;
            }
        }
        omitted.push(index);
    });

    // Naming an omitted section can push a later one over; drop from the bottom until the footer fits
    while (used + footerLength() > budget) {
        let last = -1;
        for (let i = placed.length - 1; i >= 0; i--) {
            if (!sources[placed[i].index].mandatory) {
                last = i;
                break;
            }
        }
        if (last === -1) break;
        const [removed] = placed.splice(last, 1);
        used -= removed.section.chars;
        omitted.push(removed.index);
    }

    omitted.sort((a, b) => a - b);
    const omittedTitles = omitted.map(index => sources[index].title);
    const body = placed.map(entry => entry.section.text).join('') + omittedFooter(omittedTitles, budget - used);
    const text = body.replace(/\n+$/, '\n');

    return {
        title,
        sections: placed.map(entry => entry.section),
        omitted: omittedTitles,
        budget,
        used: text.length,
        text,
    };
}
