/**
 * Curated default sources
 *
 * Canonical overview pages per topic keyword, used when no seed URL
 * yields text. Keys are lower-case single words.
 */

export type CuratedSourceMap = Readonly<Record<string, readonly string[]>>;

export const CURATED_SOURCES: CuratedSourceMap = {
  devops: ['https://aws.amazon.com/devops/what-is-devops/'],
  cloud: ['https://azure.microsoft.com/en-us/overview/what-is-cloud-computing/'],
  rpa: ['https://www.uipath.com/rpa/robotic-process-automation'],
  kubernetes: [
    'https://kubernetes.io/docs/concepts/overview/what-is-kubernetes/',
    'https://aws.amazon.com/containers/what-is-kubernetes/',
  ],
};

/**
 * Lookup key for a topic: its first word, lower-cased
 */
export function topicKey(topic: string): string {
  const [first] = topic.trim().split(/\s+/);
  return (first ?? '').toLowerCase();
}

/**
 * Merge configured entries over the built-in map.
 * Configured keys are lower-cased and replace built-in entries of the same key.
 */
export function mergeCuratedSources(
  extra: Readonly<Record<string, readonly string[]>> = {},
  base: CuratedSourceMap = CURATED_SOURCES,
): CuratedSourceMap {
  const merged: Record<string, readonly string[]> = { ...base };
  for (const [key, urls] of Object.entries(extra)) {
    merged[key.toLowerCase()] = urls;
  }
  return merged;
}

/**
 * Curated URLs for a topic, empty when the topic has no entry
 */
export function curatedUrlsFor(topic: string, sources: CuratedSourceMap = CURATED_SOURCES): readonly string[] {
  return sources[topicKey(topic)] ?? [];
}
