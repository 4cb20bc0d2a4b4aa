import js from '@eslint/js';
import tseslint from 'typescript-eslint';
import prettier from 'eslint-config-prettier';

export default [
  js.configs.recommended,
  ...tseslint.configs.recommended,
  prettier,
  {
    rules: {
      '@typescript-eslint/no-explicit-any': 'error',
      '@typescript-eslint/no-non-null-assertion': 'error',
      '@typescript-eslint/no-unused-vars': [
        'error',
        {
          argsIgnorePattern: '^_',
          varsIgnorePattern: '^_',
        },
      ],
      'no-console': [
        'warn',
        {
          allow: ['warn', 'error'],
        },
      ],
    },
  },
  {
    ignores: ['dist', 'node_modules'],
  },
  // Server rendering must be deterministic: no ambient randomness or clock reads.
  // The purity guard itself swaps these globals and is exempt.
  {
    files: ['src/ssr/**/*.ts'],
    ignores: ['src/ssr/purity.ts'],
    rules: {
      'no-restricted-properties': [
        'error',
        {
          object: 'Math',
          property: 'random',
          message:
            'Avoid Math.random during synchronous SSR: derive values from props or state.',
        },
        {
          object: 'Date',
          property: 'now',
          message:
            'Avoid Date.now during synchronous SSR: pass timestamps explicitly.',
        },
      ],
    },
  },
];
