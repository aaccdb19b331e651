import { ContactQuery, SocialProfiles } from '../../types';

/**
 * Templated profile URLs built from the person's name.
 * These are guesses: nothing here is fetched or checked.
 */
export function buildSocialProfiles(query: ContactQuery): SocialProfiles {
    const name = query.personName.trim().toLowerCase();
    return {
        linkedin: `https://linkedin.com/in/${name.replace(/\s+/g, '-')}`,
        twitter: `https://twitter.com/${name.replace(/\s+/g, '')}`,
    };
}

/**
 * Profiles reported by the authoritative service replace the guesses
 * for the same platform; empty values are ignored.
 */
export function mergeSocialProfiles(guesses: SocialProfiles, reported?: SocialProfiles): SocialProfiles {
    const merged: SocialProfiles = { ...guesses };
    if (!reported) return merged;
    for (const [platform, url] of Object.entries(reported)) {
        if (url) merged[platform] = url;
    }
    return merged;
}
