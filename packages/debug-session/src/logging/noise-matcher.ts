import type { NoiseMatcherZod } from '@dap-gateway/schemas';

export type NoiseMatcher = NoiseMatcherZod;

export function matchesNoise(matcher: NoiseMatcher, message: string): boolean {
  switch (matcher.match) {
    case 'prefix':
      return message.startsWith(matcher.text);
    case 'suffix':
      return message.endsWith(matcher.text);
    case 'contains':
      return message.includes(matcher.text);
  }
}
