import fs from 'fs-extra';
import path from 'path';
import { loadIssuesFile, saveIssuesFile } from '../harvester/archive/issuesFile';
import { ValidationError } from '../utils/errors';
import { TestPaths } from './test-config';

describe('issuesFile', () => {
  const testDir = TestPaths.unit.issuesFile;

  beforeEach(async () => {
    await fs.remove(testDir);
  });

  afterAll(async () => {
    await fs.remove(testDir);
  });

  it('should save identifiers that fetch can load back', async () => {
    const filePath = path.join(testDir, 'issues.json');

    await expect(saveIssuesFile(filePath, ['issue-a', 'issue-b'])).resolves.toBe(filePath);

    expect(await fs.readJson(filePath)).toEqual({ issues: ['issue-a', 'issue-b'] });
    await expect(loadIssuesFile(filePath)).resolves.toEqual(['issue-a', 'issue-b']);
  });

  it('should reject a missing file', async () => {
    const filePath = path.join(testDir, 'missing.json');

    await expect(loadIssuesFile(filePath)).rejects.toThrow(`Could not read issues file ${filePath}`);
  });

  it('should reject a file of the wrong shape', async () => {
    const filePath = path.join(testDir, 'issues.json');
    await fs.outputJson(filePath, { issues: ['issue-a', 42] });

    await expect(loadIssuesFile(filePath)).rejects.toBeInstanceOf(ValidationError);
    await expect(loadIssuesFile(filePath)).rejects.toThrow(
      `Issues file ${filePath} must contain {"issues": [identifier, ...]}`
    );
  });
});
