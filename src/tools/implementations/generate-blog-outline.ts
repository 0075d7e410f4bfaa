import { ToolDefinition } from '../types';
import { extractJsonObject, isStringArray } from '../json-extract';
import { MalformedUpstreamResponseError } from '../../gateway/errors';

export type BlogOutlineLength = 'short' | 'medium' | 'long';

export type BlogOutlineArgs = {
  topic: string;
  audience?: string;
  length?: BlogOutlineLength;
};

export interface BlogOutline {
  introduction: string;
  main_points: string[];
  conclusion: string;
}

const TEMPLATE_POINTS = [
  'Background and overview',
  'Key concepts and principles',
  'Practical examples',
  'Best practices',
  'Advanced considerations',
];

const POINTS_BY_LENGTH: Record<BlogOutlineLength, number> = { short: 3, medium: 4, long: 5 };

export const generateBlogOutlineTool: ToolDefinition<BlogOutlineArgs, BlogOutline> = {
  name: 'generate_blog_outline',
  version: '1.0.0',
  description: 'Draft a structured outline for a blog post',
  inputSchema: {
    type: 'object',
    required: ['topic'],
    properties: {
      topic: { type: 'string', minLength: 1, maxLength: 300 },
      audience: { type: 'string', minLength: 1, default: 'general' },
      length: { type: 'string', enum: ['short', 'medium', 'long'], default: 'medium' },
    },
    additionalProperties: false,
  },
  estimatedTokens: 900,

  buildRequest(args) {
    return {
      jsonMode: true,
      messages: [
        {
          role: 'user',
          content: [
            `Create a detailed blog post outline for the topic: "${args.topic}"`,
            '',
            `Target audience: ${args.audience ?? 'general'}`,
            `Desired length: ${args.length ?? 'medium'}`,
            '',
            'Return a JSON object with this exact structure:',
            '{',
            '  "introduction": "Brief intro description",',
            '  "main_points": ["Point 1", "Point 2", "Point 3", "Point 4"],',
            '  "conclusion": "Conclusion description"',
            '}',
            '',
            'No other text, just the JSON object.',
          ].join('\n'),
        },
      ],
    };
  },

  parse(content) {
    const outline = extractJsonObject(content);
    if (!outline) {
      throw new MalformedUpstreamResponseError('generate_blog_outline', 'No JSON object in model output');
    }
    const { introduction, main_points: mainPoints, conclusion } = outline;
    if (typeof introduction !== 'string' || typeof conclusion !== 'string' || !isStringArray(mainPoints) || mainPoints.length === 0) {
      throw new MalformedUpstreamResponseError('generate_blog_outline', 'Outline is missing introduction, main_points or conclusion');
    }
    return { introduction, main_points: mainPoints, conclusion };
  },

  fallback(args) {
    return {
      introduction: `Introduction to ${args.topic}`,
      main_points: TEMPLATE_POINTS.slice(0, POINTS_BY_LENGTH[args.length ?? 'medium']),
      conclusion: 'Summary and next steps',
    };
  },
};
