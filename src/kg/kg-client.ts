import { chunk, sparqlIri, sparqlLiteral, SparqlClient, type SparqlBinding } from './sparql-client.js';
import { getLogger } from '../utils/logger.js';

const RDFS = 'http://www.w3.org/2000/01/rdf-schema#';
const RDF_TYPE = 'http://www.w3.org/1999/02/22-rdf-syntax-ns#type';
const DBO_ABSTRACT = 'http://dbpedia.org/ontology/abstract';

/**
 * Properties never reported as relations between two cells.
 */
export const PROPERTIES_BLACKLIST: ReadonlySet<string> = new Set([
    'http://dbpedia.org/ontology/abstract',
    'http://dbpedia.org/ontology/wikiPageWikiLink',
    'http://www.w3.org/2000/01/rdf-schema#comment',
    'http://purl.org/dc/terms/subject',
]);

/**
 * Types dropped from `getTypes`.
 */
export const TYPES_BLACKLIST: ReadonlySet<string> = new Set([
    'http://www.w3.org/2002/07/owl#Thing',
]);

/** VALUES blocks per query */
const BATCH_SIZE = 25;

export interface RelationMatch {
    subject: string;
    value: string;
    properties: string[];
}

export interface KnowledgeGraphClientOptions {
    sparql: SparqlClient;

    /** Restrict label search to URIs under this namespace */
    resourcePrefix?: string;
}

/**
 * Spellings of a label tried against exact-match label lookups:
 * as given, lower, upper, first letter capitalized, title case.
 */
export function caseVariants(value: string): string[] {
    const lower = value.toLowerCase();
    const capitalized = lower.charAt(0).toUpperCase() + lower.slice(1);
    const title = lower.replace(/(^|[^\p{L}])(\p{L})/gu, (_, before: string, letter: string) => before + letter.toUpperCase());
    return [...new Set([value, lower, value.toUpperCase(), capitalized, title])];
}

function languageLiterals(values: readonly string[]): string {
    return values.flatMap((v) => [sparqlLiteral(v), sparqlLiteral(v, 'en')]).join(' ');
}

function termValue(binding: SparqlBinding, name: string): string | undefined {
    return binding[name]?.value;
}

function pushUnique(map: Map<string, string[]>, key: string, value: string): void {
    const values = map.get(key);
    if (!values) {
        map.set(key, [value]);
    } else if (!values.includes(value)) {
        values.push(value);
    }
}

/**
 * Knowledge-graph lookups over SPARQL (DBpedia vocabulary).
 */
export class KnowledgeGraphClient {
    private readonly sparql: SparqlClient;
    private readonly resourcePrefix?: string;
    private readonly subjectsMemo = new Map<string, Promise<Map<string, string[]>>>();

    constructor(options: KnowledgeGraphClientOptions) {
        this.sparql = options.sparql;
        this.resourcePrefix = options.resourcePrefix;
    }

    /**
     * English or untagged `rdfs:label` values.
     */
    async getLabels(uri: string): Promise<string[]> {
        const rows = await this.sparql.select(`
            SELECT DISTINCT ?label WHERE {
              ${sparqlIri(uri)} <${RDFS}label> ?label .
              FILTER (langMatches(lang(?label), "EN") || lang(?label) = "")
            }`);
        return rows.flatMap((row) => termValue(row, 'label') ?? []);
    }

    /**
     * `rdf:type` values, blacklisted types removed.
     */
    async getTypes(uri: string): Promise<string[]> {
        const rows = await this.sparql.select(`
            SELECT DISTINCT ?type WHERE { ${sparqlIri(uri)} <${RDF_TYPE}> ?type . }`);
        return rows
            .flatMap((row) => termValue(row, 'type') ?? [])
            .filter((type) => !TYPES_BLACKLIST.has(type));
    }

    /**
     * English `rdfs:comment` values.
     */
    async getDescriptions(uri: string): Promise<string[]> {
        const rows = await this.sparql.select(`
            SELECT DISTINCT ?comment WHERE {
              ${sparqlIri(uri)} <${RDFS}comment> ?comment .
              FILTER langMatches(lang(?comment), "EN")
            }`);
        return rows.flatMap((row) => termValue(row, 'comment') ?? []);
    }

    /**
     * English long abstracts (`dbo:abstract`), first one per URI.
     * URIs without an abstract are absent from the result.
     */
    async fetchAbstracts(uris: readonly string[]): Promise<Map<string, string>> {
        const abstracts = new Map<string, string>();
        const unique = [...new Set(uris)];

        for (const batch of chunk(unique, BATCH_SIZE)) {
            const rows = await this.sparql.select(`
                SELECT DISTINCT ?uri ?abstract WHERE {
                  VALUES ?uri { ${batch.map(sparqlIri).join(' ')} }
                  ?uri <${DBO_ABSTRACT}> ?abstract .
                  FILTER langMatches(lang(?abstract), "EN")
                }`);

            for (const row of rows) {
                const uri = termValue(row, 'uri');
                const abstract = termValue(row, 'abstract');
                if (uri !== undefined && abstract !== undefined && !abstracts.has(uri)) {
                    abstracts.set(uri, abstract);
                }
            }
        }

        getLogger().debug({ requested: unique.length, found: abstracts.size }, 'Fetched abstracts');
        return abstracts;
    }

    /**
     * Properties linking each subject to a literal (or the label of a
     * resource) equal to the value, compared case-insensitively.
     * Pairs with no link are absent from the result.
     */
    async getRelations(
        pairs: ReadonlyArray<readonly [subject: string, value: string]>,
        filterBlacklisted = true
    ): Promise<RelationMatch[]> {
        const matches = new Map<string, RelationMatch>();

        for (const batch of chunk(pairs, BATCH_SIZE)) {
            const values = batch
                .map(([subject, value]) => `(${sparqlIri(subject)} ${sparqlLiteral(value.toLowerCase())})`)
                .join(' ');

            const rows = await this.sparql.select(`
                SELECT DISTINCT ?entity ?value ?rel WHERE {
                  VALUES (?entity ?value) { ${values} }
                  { ?entity ?rel ?aValue . }
                  UNION
                  { ?entity ?rel [<${RDFS}label> ?aValue] . }
                  FILTER (lcase(str(?aValue)) = ?value)
                }`);

            for (const row of rows) {
                const subject = termValue(row, 'entity');
                const value = termValue(row, 'value');
                const property = termValue(row, 'rel');
                if (subject === undefined || value === undefined || property === undefined) continue;
                if (filterBlacklisted && PROPERTIES_BLACKLIST.has(property)) continue;

                const key = `${subject}\u0000${value}`;
                let match = matches.get(key);
                if (!match) {
                    match = { subject, value, properties: [] };
                    matches.set(key, match);
                }
                if (!match.properties.includes(property)) match.properties.push(property);
            }
        }

        return [...matches.values()];
    }

    /**
     * Subjects of `<subject> <prop> value` (or of a resource labelled value),
     * with their labels. Only case variants of the value are tried, so a
     * full case-insensitive scan never hits the endpoint. Memoized per client.
     */
    getSubjects(property: string, value: string): Promise<Map<string, string[]>> {
        const memoKey = `${property}\u0000${value}`;
        let pending = this.subjectsMemo.get(memoKey);
        if (!pending) {
            pending = this.querySubjects(property, value);
            this.subjectsMemo.set(memoKey, pending);
            // A failed query is not remembered
            void pending.catch(() => this.subjectsMemo.delete(memoKey));
        }
        return pending;
    }

    /**
     * Resources whose `rdfs:label` matches a case variant of the label,
     * shortest URI first (ties by URI).
     */
    async findByLabel(label: string, limit: number): Promise<string[]> {
        const prefixFilter = this.resourcePrefix
            ? `FILTER (STRSTARTS(STR(?s), ${sparqlLiteral(this.resourcePrefix)}))`
            : '';

        const rows = await this.sparql.select(`
            SELECT DISTINCT ?s WHERE {
              VALUES ?label { ${languageLiterals(caseVariants(label))} }
              ?s <${RDFS}label> ?label .
              ${prefixFilter}
            }`);

        const uris = [...new Set(rows.flatMap((row) => termValue(row, 's') ?? []))];
        uris.sort((a, b) => a.length - b.length || (a < b ? -1 : a > b ? 1 : 0));
        return uris.slice(0, limit);
    }

    private async querySubjects(property: string, value: string): Promise<Map<string, string[]>> {
        const prop = sparqlIri(property);
        const rows = await this.sparql.select(`
            SELECT DISTINCT ?subject (str(?l) AS ?label) WHERE {
              VALUES ?value { ${languageLiterals(caseVariants(value))} }
              { ?subject ${prop} ?value . }
              UNION
              { ?subject ${prop} [<${RDFS}label> ?value] . }
              ?subject <${RDFS}label> ?l .
              FILTER (langMatches(lang(?l), "EN") || lang(?l) = "")
            }`);

        const subjects = new Map<string, string[]>();
        for (const row of rows) {
            const subject = termValue(row, 'subject');
            const subjectLabel = termValue(row, 'label');
            if (subject !== undefined && subjectLabel !== undefined) {
                pushUnique(subjects, subject, subjectLabel);
            }
        }
        return subjects;
    }
}
