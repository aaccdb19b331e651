import fs from 'fs';
import yaml from 'js-yaml';
import { z } from 'zod';
import { ContactQuery, SourceTier } from '../../types';
import { ConfigurationError } from '../../utils/errors';

const SourceDescriptorSchema = z.object({
    name: z.string().trim().min(1),
    endpointTemplate: z.string().trim().min(1),
    baseWeight: z.number().gt(0).lte(1),
});

const SourcesFileSchema = z.object({
    tiers: z.array(z.object({
        name: z.string().trim().min(1),
        sources: z.array(SourceDescriptorSchema).min(1),
    })).min(1),
});

const cache = new Map<string, SourceTier[]>();

export function parseSourceTiers(contents: string, origin = 'sources'): SourceTier[] {
    let raw: unknown;
    try {
        raw = yaml.load(contents);
    } catch (e) {
        const reason = e instanceof Error ? e.message : String(e);
        throw new ConfigurationError(`Failed to parse YAML in ${origin}: ${reason}`);
    }

    const parsed = SourcesFileSchema.safeParse(raw);
    if (!parsed.success) {
        const issues = parsed.error.issues
            .map((issue) => `- ${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('\n');
        throw new ConfigurationError(`Invalid source catalogue ${origin}:\n${issues}`);
    }
    return parsed.data.tiers;
}

export function loadSourceTiers(filePath: string): SourceTier[] {
    const cached = cache.get(filePath);
    if (cached) return cached;

    let contents: string;
    try {
        contents = fs.readFileSync(filePath, 'utf8');
    } catch (e) {
        const reason = e instanceof Error ? e.message : String(e);
        throw new ConfigurationError(`Cannot read source catalogue ${filePath}: ${reason}`);
    }

    const tiers = parseSourceTiers(contents, filePath);
    cache.set(filePath, tiers);
    return tiers;
}

/**
 * Best guess at the employer's web host: `Acme Corp` -> `www.acmecorp.com`.
 */
export function guessCompanyDomain(companyName: string): string {
    const slug = companyName.toLowerCase().replace(/[^a-z0-9-]/g, '');
    return `www.${slug}.com`;
}

export function buildSearchQuery(query: ContactQuery): string {
    return `${query.personName.trim()} ${query.companyName.trim()} contact phone`;
}

export function renderEndpoint(template: string, query: ContactQuery): string {
    const values: Record<string, string> = {
        person: encodeURIComponent(query.personName.trim()),
        company: encodeURIComponent(query.companyName.trim()),
        query: encodeURIComponent(buildSearchQuery(query)),
        domain: guessCompanyDomain(query.companyName),
    };
    return template.replace(/\{(person|company|query|domain)\}/g, (_, key: string) => values[key] ?? '');
}
