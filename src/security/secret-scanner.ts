export interface SecurityFinding {
  path: string;
  type: string;
  line: number;
  message: string;
}

/*
 * Pluggable content scan run on raw file content before any action. The
 * orchestrator decides what a finding means from the file's securityCheck.
 */
export interface SecurityCheck {
  scan(content: string, path: string): SecurityFinding[];
}

const VALUE = String.raw`\s*[=:]\s*["']?[\w\-.]+["']?`;

const SENSITIVE_KEYS = [
  'password',
  'passwd',
  'pwd',
  'secret[_-]?key',
  'api[_-]?key',
  'apikey',
  'token',
  'auth[_-]?token',
  'access[_-]?token',
  'private[_-]?key',
  'aws[_-]?access[_-]?key[_-]?id',
  'aws[_-]?secret[_-]?access[_-]?key',
];

export const SENSITIVE_PATTERNS: RegExp[] = SENSITIVE_KEYS.map((key) => new RegExp(`${key}${VALUE}`, 'i'));

export function classifySecret(line: string): string {
  const lower = line.toLowerCase();
  if (['password', 'passwd', 'pwd'].some((word) => lower.includes(word))) return 'Password';
  if (lower.includes('api') && lower.includes('key')) return 'API Key';
  if (lower.includes('secret') && lower.includes('key')) return 'Secret Key';
  if (lower.includes('token')) return 'Auth Token';
  if (lower.includes('private') && lower.includes('key')) return 'Private Key';
  if (lower.includes('aws')) return 'AWS Credential';
  return 'Secret';
}

/*
 * Line-oriented regex scan. Reports at most one finding per line.
 */
export class RegexSecretScanner implements SecurityCheck {
  constructor(private readonly patterns: RegExp[] = SENSITIVE_PATTERNS) {}

  scan(content: string, path: string): SecurityFinding[] {
    const findings: SecurityFinding[] = [];
    content.split(/\r?\n/).forEach((line, index) => {
      if (!this.patterns.some((pattern) => pattern.test(line))) return;
      const type = classifySecret(line);
      findings.push({ path, type, line: index + 1, message: `Potential ${type} detected on line ${index + 1}` });
    });
    return findings;
  }
}
