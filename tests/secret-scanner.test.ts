import { describe, it, expect } from 'vitest';
import { RegexSecretScanner, classifySecret } from '../src/security/secret-scanner.js';

describe('RegexSecretScanner', () => {
    const scanner = new RegexSecretScanner();

    it('reports one finding per offending line', () => {
        const content = 'name = demo\npassword = test-secret\napi_key: test-key\n';
        expect(scanner.scan(content, 'config.env')).toEqual([
            {
                path: 'config.env',
                type: 'Password',
                line: 2,
                message: 'Potential Password detected on line 2',
            },
            {
                path: 'config.env',
                type: 'API Key',
                line: 3,
                message: 'Potential API Key detected on line 3',
            },
        ]);
    });

    it('ignores keys without an assigned value', () => {
        expect(scanner.scan('Enter your password below.\n', 'README.md')).toEqual([]);
    });

    it('accepts custom patterns', () => {
        const custom = new RegexSecretScanner([/internal-\d+/]);
        expect(custom.scan('id internal-42', 'a.txt')).toHaveLength(1);
        expect(custom.scan('password = test-secret', 'a.txt')).toEqual([]);
    });
});

describe('classifySecret', () => {
    it('names the kind of secret', () => {
        expect(classifySecret('token=abc')).toBe('Auth Token');
        expect(classifySecret('SECRET_KEY=abc')).toBe('Secret Key');
        expect(classifySecret('aws_access_key_id=abc')).toBe('AWS Credential');
    });
});
