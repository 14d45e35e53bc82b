export interface MetadataConfig {
  /** Names looked for in the path of a file to guess its creator. */
  creatorTags: string[];
  /** Creator used when none of the tags matches. */
  creatorName: string;
}

export const DEFAULT_METADATA_CONFIG: MetadataConfig = {
  creatorTags: [],
  creatorName: '',
};

export const parseTagList = (name: string, rawValue: string | undefined): string[] => {
  if (rawValue === undefined || rawValue.trim() === '') {
    return [];
  }

  const tags = rawValue
    .split(',')
    .map((tag) => tag.trim())
    .filter((tag) => tag !== '');
  if (tags.length === 0) {
    throw new Error(`Invalid ${name} value "${rawValue}". Expected a comma separated list of names.`);
  }
  return tags;
};

export const loadMetadataConfig = (env: NodeJS.ProcessEnv = process.env): MetadataConfig => ({
  creatorTags: parseTagList('NKI2SFZ_CREATOR_TAGS', env.NKI2SFZ_CREATOR_TAGS),
  creatorName: env.NKI2SFZ_CREATOR_NAME?.trim() ?? DEFAULT_METADATA_CONFIG.creatorName,
});
