export interface Truncation {
    shown: number;
    total: number;
}

/**
 * One delimited section of a profile document
 */
export interface ProfileSection {
    id: string;
    title: string;
    text: string;
    /** Characters this section consumed from the budget */
    chars: number;
    truncation?: Truncation;
}

export interface ProfileDocument {
    title: string;
    sections: ProfileSection[];
    omitted: string[];
    budget: number;
    used: number;
    text: string;
}

export interface Profile {
    primary: ProfileDocument;
    moduleMaps: ProfileDocument[];
}
