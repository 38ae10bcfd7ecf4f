import path from 'path';
import { DEFAULT_SETTINGS, createSettings, loadSettingsFile } from '../src/config/settings';
import { ErrorCode } from '../src/types';
import { CheckerError } from '../src/utils/error-handler';
import { createProject, removeProject } from './helpers/temp-project';

describe('Checker settings', () => {
  let directory: string | undefined;

  afterEach(() => {
    if (directory) removeProject(directory);
    directory = undefined;
  });

  test('should default to the documented thresholds', () => {
    const settings = createSettings();

    expect(settings).toEqual(DEFAULT_SETTINGS);
    expect(settings.maxTravel).toBe(1000);
    expect(settings.maxFeedRate).toBe(10000);
  });

  test('should ignore overrides that are undefined', () => {
    const settings = createSettings({ maxTravel: 500, maxFeedRate: undefined });

    expect(settings.maxTravel).toBe(500);
    expect(settings.maxFeedRate).toBe(10000);
  });

  test('should reject invalid thresholds', () => {
    expect(() => createSettings({ maxTravel: 0 })).toThrow(CheckerError);
    expect(() => createSettings({ subprogramExtensions: [] })).toThrow(/subprogramExtensions/);
  });

  test('should load a partial settings file', () => {
    directory = createProject({ 'checker.json': '{ "maxFeedRate": 5000, "subprogramExtensions": [".nc"] }' });

    expect(loadSettingsFile(path.join(directory, 'checker.json'))).toEqual({
      maxFeedRate: 5000,
      subprogramExtensions: ['.nc']
    });
  });

  test('should report a settings file that is not JSON', () => {
    const project = createProject({ 'checker.json': 'maxFeedRate = 5000' });
    directory = project;

    expect(() => loadSettingsFile(path.join(project, 'checker.json'))).toThrow('is not valid JSON');
  });

  test('should report invalid values in a settings file', () => {
    const project = createProject({ 'checker.json': '{ "maxTravel": -1 }' });
    directory = project;

    let thrown: unknown;
    try {
      loadSettingsFile(path.join(project, 'checker.json'));
    } catch (error) {
      thrown = error;
    }
    expect(thrown).toMatchObject({ code: ErrorCode.InvalidSettings });
  });
});
