import { ToolDefinition } from '../types';
import { extractJsonArray } from '../json-extract';
import { MalformedUpstreamResponseError } from '../../gateway/errors';

export type BlogTopicsArgs = {
  interests: string[];
  past_topics?: string[];
  count?: number;
};

export interface BlogTopics {
  topics: string[];
}

const DEFAULT_COUNT = 5;
const MIN_TOPIC_LENGTH = 10;

const FALLBACK_TEMPLATES: Array<(interest: string) => string> = [
  (i) => `Getting started with ${i}: a practical introduction`,
  (i) => `${i} best practices for real-world projects`,
  (i) => `Common ${i} mistakes and how to avoid them`,
  (i) => `Building your first project with ${i}`,
  (i) => `Lessons learned after a year of ${i}`,
];

/** Strip list markers, numbering and quotes a model puts around each line */
function cleanLine(line: string): string {
  return line
    .trim()
    .replace(/^[\s"'\-•*\d.)]+/, '')
    .replace(/["',]+$/, '')
    .trim();
}

export const generateBlogTopicsTool: ToolDefinition<BlogTopicsArgs, BlogTopics> = {
  name: 'generate_blog_topics',
  version: '1.0.0',
  description: 'Suggest blog post topics from a list of interests',
  inputSchema: {
    type: 'object',
    required: ['interests'],
    properties: {
      interests: { type: 'array', items: { type: 'string', minLength: 1 }, minItems: 1, maxItems: 20 },
      past_topics: { type: 'array', items: { type: 'string' }, maxItems: 100, default: [] },
      count: { type: 'integer', minimum: 1, maximum: 20, default: DEFAULT_COUNT },
    },
    additionalProperties: false,
  },
  estimatedTokens: 600,

  buildRequest(args) {
    const count = args.count ?? DEFAULT_COUNT;
    const past = args.past_topics && args.past_topics.length > 0 ? args.past_topics.join(', ') : 'nothing yet';
    return {
      jsonMode: false,
      messages: [
        {
          role: 'user',
          content: [
            `Generate ${count} engaging blog post topic ideas for someone interested in: ${args.interests.join(', ')}.`,
            '',
            `They've previously written about: ${past}.`,
            '',
            'Requirements:',
            '- Each topic should be specific and actionable',
            '- Topics should be relevant to the interests',
            '- Avoid duplicating past topics',
            '- Make them engaging and clickable',
            '',
            'Return ONLY a JSON array of topic strings, like: ["Topic 1", "Topic 2", ...]',
            'No other text, no explanations, just the JSON array.',
          ].join('\n'),
        },
      ],
    };
  },

  parse(content, args) {
    const count = args.count ?? DEFAULT_COUNT;
    const array = extractJsonArray(content);

    let topics: string[];
    if (array) {
      topics = array
        .filter((t): t is string => typeof t === 'string')
        .map((t) => t.trim())
        .filter((t) => t.length > 0);
    } else {
      topics = content
        .split('\n')
        .filter((line) => line.trim() && !line.trim().startsWith('['))
        .map(cleanLine)
        .filter((t) => t.length > MIN_TOPIC_LENGTH);
    }

    if (topics.length === 0) {
      throw new MalformedUpstreamResponseError('generate_blog_topics', 'No topics found in model output');
    }
    return { topics: topics.slice(0, count) };
  },

  fallback(args) {
    const count = args.count ?? DEFAULT_COUNT;
    const past = new Set((args.past_topics ?? []).map((t) => t.toLowerCase()));
    const topics: string[] = [];

    // Walk templates × interests so each interest gets coverage before repeats
    outer: for (const template of FALLBACK_TEMPLATES) {
      for (const interest of args.interests) {
        const topic = template(interest);
        if (past.has(topic.toLowerCase()) || topics.includes(topic)) continue;
        topics.push(topic);
        if (topics.length >= count) break outer;
      }
    }
    return { topics };
  },
};
