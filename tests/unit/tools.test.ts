import { generateBlogTopicsTool } from '../../src/tools/implementations/generate-blog-topics';
import { generateBlogOutlineTool } from '../../src/tools/implementations/generate-blog-outline';
import { moderateContentTool } from '../../src/tools/implementations/moderate-content';
import { MalformedUpstreamResponseError } from '../../src/gateway/errors';

describe('generate_blog_topics', () => {
  const args = { interests: ['rust', 'databases'], past_topics: [], count: 3 };

  it('should parse a JSON array embedded in prose', () => {
    const content = 'Here you go:\n["Ownership in Rust", "  Indexing strategies  ", "Query planning", "Extra"]';
    expect(generateBlogTopicsTool.parse(content, args)).toEqual({
      topics: ['Ownership in Rust', 'Indexing strategies', 'Query planning'],
    });
  });

  it('should fall back to line parsing when there is no JSON array', () => {
    const content = '1. Why Rust ownership matters\n2) "Choosing a database engine"\n- short\n';
    expect(generateBlogTopicsTool.parse(content, args)).toEqual({
      topics: ['Why Rust ownership matters', 'Choosing a database engine'],
    });
  });

  it('should reject output with no usable topics', () => {
    expect(() => generateBlogTopicsTool.parse('[]', args)).toThrow(MalformedUpstreamResponseError);
  });

  it('should build fallback topics across interests, skipping past ones', () => {
    const result = generateBlogTopicsTool.fallback({
      interests: ['rust', 'databases'],
      past_topics: ['GETTING STARTED WITH RUST: A PRACTICAL INTRODUCTION'],
      count: 3,
    });
    expect(result).toEqual({
      topics: [
        'Getting started with databases: a practical introduction',
        'rust best practices for real-world projects',
        'databases best practices for real-world projects',
      ],
    });
  });

  it('should ask for the requested count in the prompt', () => {
    const request = generateBlogTopicsTool.buildRequest(args);
    expect(request.jsonMode).toBe(false);
    expect(request.messages[0].content).toContain('Generate 3 engaging blog post topic ideas');
  });
});

describe('generate_blog_outline', () => {
  const args = { topic: 'Caching', audience: 'beginners', length: 'short' as const };

  it('should parse a complete outline', () => {
    const content = '```json\n{"introduction": "Why cache", "main_points": ["TTL", "Keys"], "conclusion": "Go cache"}\n```';
    expect(generateBlogOutlineTool.parse(content, args)).toEqual({
      introduction: 'Why cache',
      main_points: ['TTL', 'Keys'],
      conclusion: 'Go cache',
    });
  });

  it('should reject an outline without main points', () => {
    const content = '{"introduction": "Why cache", "main_points": [], "conclusion": "Go cache"}';
    expect(() => generateBlogOutlineTool.parse(content, args)).toThrow(MalformedUpstreamResponseError);
  });

  it('should size the fallback outline by length', () => {
    expect(generateBlogOutlineTool.fallback(args)).toEqual({
      introduction: 'Introduction to Caching',
      main_points: ['Background and overview', 'Key concepts and principles', 'Practical examples'],
      conclusion: 'Summary and next steps',
    });
    expect(generateBlogOutlineTool.fallback({ topic: 'Caching', length: 'long' }).main_points).toHaveLength(5);
  });
});

describe('moderate_content', () => {
  it('should clamp confidence and default missing fields', () => {
    expect(moderateContentTool.parse('{"safe": false, "confidence": 1.7}', { text: 'x' })).toEqual({
      safe: false,
      confidence: 1,
      violations: [],
      reason: '',
    });
  });

  it('should reject a verdict without a boolean safe flag', () => {
    expect(() => moderateContentTool.parse('{"safe": "yes"}', { text: 'x' })).toThrow(MalformedUpstreamResponseError);
  });

  it('should flag spam phrases and link floods in the fallback', () => {
    expect(moderateContentTool.fallback({ text: 'Limited offer, CLICK HERE today' })).toEqual({
      safe: false,
      confidence: 0.6,
      violations: ['spam'],
      reason: 'Rule-based check flagged: spam',
    });
    const links = 'see https://a.test https://b.test https://c.test';
    expect(moderateContentTool.fallback({ text: links }).violations).toEqual(['spam']);
  });

  it('should flag phone numbers as personal information', () => {
    expect(moderateContentTool.fallback({ text: 'call +1 555 123 4567 now' }).violations).toEqual([
      'personal_information',
    ]);
  });

  it('should pass clean text with low confidence', () => {
    expect(moderateContentTool.fallback({ text: 'I enjoyed this article' })).toEqual({
      safe: true,
      confidence: 0.3,
      violations: [],
      reason: 'Rule-based check found no violations',
    });
  });
});
