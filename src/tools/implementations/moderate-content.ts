import { ToolDefinition } from '../types';
import { extractJsonObject, isStringArray } from '../json-extract';
import { MalformedUpstreamResponseError } from '../../gateway/errors';

export type ModerationArgs = {
  text: string;
  context?: string;
};

export interface ModerationResult {
  safe: boolean;
  confidence: number;
  violations: string[];
  reason: string;
}

const EMAIL_REGEX = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/;
const PHONE_REGEX = /\+?\d[\d\s\-().]{7,}\d/;
const URL_REGEX = /https?:\/\/\S+/g;
const SPAM_PHRASES = ['buy now', 'click here', 'limited offer', 'free money', 'act now'];
const MAX_LINKS = 2;

function clamp01(n: number): number {
  return Math.min(1, Math.max(0, n));
}

export const moderateContentTool: ToolDefinition<ModerationArgs, ModerationResult> = {
  name: 'moderate_content',
  version: '1.0.0',
  description: 'Check user content for policy violations',
  inputSchema: {
    type: 'object',
    required: ['text'],
    properties: {
      text: { type: 'string', minLength: 1, maxLength: 10_000 },
      context: { type: 'string', minLength: 1, default: 'general' },
    },
    additionalProperties: false,
  },
  estimatedTokens: 400,

  buildRequest(args) {
    return {
      jsonMode: true,
      temperature: 0,
      messages: [
        {
          role: 'user',
          content: [
            `Analyze this ${args.context ?? 'general'} content for policy violations.`,
            '',
            `Content: "${args.text}"`,
            '',
            'Check for:',
            '- Spam or promotional content',
            '- Hate speech or harassment',
            '- Explicit or adult content',
            '- Misinformation',
            '- Personal information',
            '',
            'Respond with JSON only:',
            '{',
            '  "safe": true or false,',
            '  "confidence": 0.0-1.0,',
            '  "violations": ["type1", "type2"] or [],',
            '  "reason": "brief explanation"',
            '}',
          ].join('\n'),
        },
      ],
    };
  },

  parse(content) {
    const verdict = extractJsonObject(content);
    if (!verdict || typeof verdict.safe !== 'boolean') {
      throw new MalformedUpstreamResponseError('moderate_content', 'Moderation verdict is missing "safe"');
    }
    return {
      safe: verdict.safe,
      confidence: typeof verdict.confidence === 'number' ? clamp01(verdict.confidence) : 0.5,
      violations: isStringArray(verdict.violations) ? verdict.violations : [],
      reason: typeof verdict.reason === 'string' ? verdict.reason : '',
    };
  },

  // Keyword and pattern checks only; permissive when nothing matches
  fallback(args) {
    const lower = args.text.toLowerCase();
    const violations: string[] = [];

    if (EMAIL_REGEX.test(args.text) || PHONE_REGEX.test(args.text)) {
      violations.push('personal_information');
    }
    const links = args.text.match(URL_REGEX)?.length ?? 0;
    if (links > MAX_LINKS || SPAM_PHRASES.some((p) => lower.includes(p))) {
      violations.push('spam');
    }

    if (violations.length > 0) {
      return {
        safe: false,
        confidence: 0.6,
        violations,
        reason: `Rule-based check flagged: ${violations.join(', ')}`,
      };
    }
    return {
      safe: true,
      confidence: 0.3,
      violations: [],
      reason: 'Rule-based check found no violations',
    };
  },
};
