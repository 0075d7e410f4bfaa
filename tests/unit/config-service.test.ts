import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { loadExperimentsFile, resolveExperiments, DEFAULT_EXPERIMENTS_FILE } from '../../src/config/config-service';
import { ConfigurationError } from '../../src/gateway/errors';

describe('loadExperimentsFile', () => {
  let dir: string;

  beforeAll(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'aigw-experiments-'));
  });

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  const write = (name: string, content: string): string => {
    const file = path.join(dir, name);
    fs.writeFileSync(file, content);
    return file;
  };

  it('should load the bundled experiments file', () => {
    expect(loadExperimentsFile(DEFAULT_EXPERIMENTS_FILE)).toEqual([
      {
        name: 'topic_prompt_style',
        description: 'Concise versus exploratory topic prompts',
        variants: [
          { name: 'concise', weight: 70 },
          { name: 'exploratory', weight: 30 },
        ],
      },
    ]);
  });

  it('should return no experiments when the file is missing', () => {
    expect(loadExperimentsFile(path.join(dir, 'absent.yaml'))).toEqual([]);
  });

  it('should reject a file with a fractional weight', () => {
    const file = write(
      'bad-weight.yaml',
      ['experiments:', '  - name: broken', '    variants:', '      - name: a', '        weight: 1.5'].join('\n'),
    );
    expect(() => loadExperimentsFile(file)).toThrow(ConfigurationError);
  });

  it('should reject a file without an experiments list', () => {
    const file = write('empty.yaml', 'something_else: true\n');
    expect(() => loadExperimentsFile(file)).toThrow(/Invalid experiments file/);
  });
});

describe('resolveExperiments', () => {
  const fileExperiments = [
    { name: 'topic_prompt_style', variants: [{ name: 'concise', weight: 1 }] },
    { name: 'ai_vs_rules', variants: [{ name: 'ai', weight: 1 }] },
  ];

  it('should put the built-in experiment first with weights from configuration', () => {
    const experiments = resolveExperiments('ai:80,rules:20', fileExperiments);

    expect(experiments.map((e) => e.name)).toEqual(['ai_vs_rules', 'topic_prompt_style']);
    expect(experiments[0].variants).toEqual([
      { name: 'ai', weight: 80 },
      { name: 'rules', weight: 20 },
    ]);
  });

  it('should reject variants other than ai and rules', () => {
    expect(() => resolveExperiments('ai:50,llm:50', [])).toThrow('only supports variants "ai" and "rules", got: llm');
  });

  it('should reject malformed weights', () => {
    expect(() => resolveExperiments('ai=50', [])).toThrow(ConfigurationError);
  });
});
