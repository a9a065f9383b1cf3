import { FileUtils } from '../../utils/fileUtils';
import { ValidationError } from '../../utils/errors';
import { logger } from '../../utils/logger';

/** Hand-off format between `search --output` and `fetch --issues-file`. */
export interface IssuesFile {
  issues: string[];
}

function isIssuesFile(value: unknown): value is IssuesFile {
  if (typeof value !== 'object' || value === null || !('issues' in value)) {
    return false;
  }
  const { issues } = value;
  return Array.isArray(issues) && issues.every(issue => typeof issue === 'string');
}

export async function saveIssuesFile(filePath: string, identifiers: string[]): Promise<string> {
  const data: IssuesFile = { issues: identifiers };
  await FileUtils.writeJSON(filePath, data);
  logger.info(`Saved ${identifiers.length} issue identifiers to ${filePath}`);
  return filePath;
}

export async function loadIssuesFile(filePath: string): Promise<string[]> {
  const data = await FileUtils.readJSON<unknown>(filePath);
  if (data === null) {
    throw new ValidationError(`Could not read issues file ${filePath}`);
  }
  if (!isIssuesFile(data)) {
    throw new ValidationError(`Issues file ${filePath} must contain {"issues": [identifier, ...]}`);
  }
  logger.debug(`Loaded ${data.issues.length} issue identifiers from ${filePath}`);
  return data.issues;
}
