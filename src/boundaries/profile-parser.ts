import * as YAML from 'yaml';
import { PROFILE_FILE_SCHEMA, type ProfileFile } from '../schemas/profile-schemas';
import { ValidationError, ProcessingError, handleUnknownError } from '../errors/index';

export function parseProfileYaml(yamlContent: string): ProfileFile {
  let raw: unknown;

  try {
    raw = YAML.parse(yamlContent) ?? {};
  } catch (e: unknown) {
    const err = handleUnknownError(e, 'YAML parsing');
    throw new ProcessingError(`Failed to parse YAML: ${err.message}`);
  }

  const result = PROFILE_FILE_SCHEMA.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || 'profiles'}: ${issue.message}`)
      .join('; ');
    throw new ValidationError(`Invalid chunking profiles: ${details}`);
  }
  return result.data;
}
