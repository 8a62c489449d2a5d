import keywords from './keywords.json';
import { GenerativeHandler } from './base';
import { keywordConfidence, containsAny } from './scoring';
import type { GenerationPersona } from '../services/generation';
import type { Metadata } from '../types/common';

export type ProblemType = 'performance' | 'connection' | 'installation' | 'stability' | 'general';

export interface TechnicalDetails {
  errorCodes: string[];
  errorMessages: string[];
  problemType: ProblemType;
  urgency: 'high' | 'normal';
}

const PROBLEM_TYPE_WORDS: Array<[Exclude<ProblemType, 'general'>, string[]]> = [
  ['performance', ['slow', 'performance', 'lag']],
  ['connection', ['connection', 'network', 'internet', 'wifi']],
  ['installation', ['install', 'setup', 'configuration']],
  ['stability', ['crash', 'freeze', 'hang']]
];

const URGENT_WORDS = ['urgent', 'emergency', 'critical', 'broken', 'not working'];
const SEVERE_PHRASES = ['hardware failure', 'data loss', 'security breach'];

const TROUBLESHOOTING: Record<ProblemType, string[]> = {
  performance: [
    'Close applications you are not using',
    'Restart the device to free up memory',
    'Check that there is enough free disk space',
    'Install any pending updates'
  ],
  connection: [
    'Check that other sites or apps can reach the internet',
    'Restart your router or modem',
    'Turn off any VPN or proxy and try again',
    'Forget the network and reconnect'
  ],
  installation: [
    'Run the installer as an administrator',
    'Temporarily disable antivirus software during setup',
    'Download a fresh copy of the installer',
    'Confirm your system meets the minimum requirements'
  ],
  stability: [
    'Update the application to the latest version',
    'Update your device drivers',
    'Start the application in safe mode if available',
    'Reinstall the application'
  ],
  general: [
    'Restart the application or device',
    'Check for software updates',
    'Clear cache and temporary files',
    'Contact support if the issue persists'
  ]
};

export function extractTechnicalDetails(text: string): TechnicalDetails {
  const lowered = text.toLowerCase();

  const errorCodes = Array.from(
    new Set([
      ...Array.from(text.matchAll(/\b0x[0-9a-f]{4,8}\b/gi), (match) => match[0].toLowerCase()),
      ...Array.from(lowered.matchAll(/error\s+code[:\s#]*([a-z0-9-]+)/g), (match) => match[1])
    ])
  );

  const errorMessages: string[] = [];
  for (const pattern of [/"([^"]*error[^"]*)"/g, /(?:failed|crash(?:ed)?)[:\s]+([^\n.]+)/g]) {
    for (const match of lowered.matchAll(pattern)) {
      errorMessages.push(match[1].trim());
    }
  }

  const problemType =
    PROBLEM_TYPE_WORDS.find(([, words]) => containsAny(lowered, words))?.[0] ?? 'general';

  return {
    errorCodes,
    errorMessages,
    problemType,
    urgency: containsAny(lowered, URGENT_WORDS) ? 'high' : 'normal'
  };
}

export function troubleshootingSteps(problemType: ProblemType): string[] {
  return TROUBLESHOOTING[problemType];
}

/**
 * Whether the issue looks like it needs a human engineer.
 */
export function needsEngineer(text: string, details: TechnicalDetails): boolean {
  return (
    containsAny(text, SEVERE_PHRASES) ||
    details.urgency === 'high' ||
    details.errorMessages.length > 2
  );
}

export class TechnicalHandler extends GenerativeHandler {
  readonly kind = 'technical' as const;

  protected readonly persona: GenerationPersona = {
    name: 'Technical Support',
    instructions: `You are a technical support specialist who helps customers troubleshoot product and service issues.

## Troubleshooting Approach:
1. Identify the problem from the symptoms and any error codes
2. Offer step-by-step instructions, one action per step
3. Ask for the specific detail you need when the description is incomplete

## Communication Style:
- Use clear, non-technical language when possible
- Be patient and encouraging
- Provide an alternative when the first solution may not apply`
  };

  confidence(text: string): number {
    return keywordConfidence(text, keywords.technical, 0.2);
  }

  protected analyze(text: string): Metadata {
    const details = extractTechnicalDetails(text);
    return {
      ...details,
      troubleshootingSteps: troubleshootingSteps(details.problemType),
      suggestEscalation: needsEngineer(text, details)
    };
  }

  protected fallbackText(text: string): string {
    const details = extractTechnicalDetails(text);
    const steps = troubleshootingSteps(details.problemType)
      .map((step, index) => `${index + 1}. ${step}`)
      .join('\n');
    const code = details.errorCodes.length > 0 ? ` (error ${details.errorCodes.join(', ')})` : '';

    return `I'm having trouble reaching our support assistant right now, but here are some steps that usually help with this kind of issue${code}:\n${steps}\nIf none of these work, reply here or ask to speak with a support engineer.`;
  }
}
