import { describe, expect, it } from 'vitest';

import {
  actionPrompts,
  compose,
  composeExternalToolInstruction,
  composeTaskPrompt,
  deriveStartUrl,
  extractClickTarget,
  extractStartUrl,
  isActionLike,
} from './composer.js';

describe('extractClickTarget', () => {
  it('takes the plain phrase after "click"', () => {
    expect(extractClickTarget('go to apple.com and click Learn more')).toBe('Learn more');
  });

  it('prefers the quoted phrase', () => {
    expect(extractClickTarget('Click "Sign up" on the homepage')).toBe('Sign up');
    expect(extractClickTarget("click on 'Pricing' please")).toBe('Pricing');
  });

  it('drops the article and the trailing element noun', () => {
    expect(extractClickTarget('click the Pricing tab.')).toBe('Pricing');
    expect(extractClickTarget('Click on the Buy button!')).toBe('Buy');
  });

  it('returns an empty string without a click phrase', () => {
    expect(extractClickTarget('summarize this page')).toBe('');
    expect(extractClickTarget('   ')).toBe('');
  });
});

describe('isActionLike', () => {
  it('detects navigation and purchase verbs', () => {
    expect(isActionLike('go to apple.com and click Learn more')).toBe(true);
    expect(isActionLike('Compare the two plans')).toBe(true);
  });

  it('rejects read-only requests', () => {
    expect(isActionLike('summarize this page')).toBe(false);
  });
});

describe('extractStartUrl', () => {
  it('promotes a bare domain to https', () => {
    expect(extractStartUrl('go to apple.com and click Learn more')).toBe('https://apple.com');
  });

  it('keeps an absolute URL and strips trailing punctuation', () => {
    expect(extractStartUrl('Open https://example.com/docs.')).toBe('https://example.com/docs');
    expect(extractStartUrl('(see http://example.org/a)')).toBe('http://example.org/a');
  });

  it('returns an empty string when nothing looks like a URL', () => {
    expect(extractStartUrl('summarize this page')).toBe('');
  });

  it('falls back to the context', () => {
    expect(deriveStartUrl('summarize this page', 'Currently on example.org')).toBe(
      'https://example.org',
    );
    expect(deriveStartUrl('open example.com', 'other.net')).toBe('https://example.com');
  });
});

describe('compose', () => {
  it('builds the task prompt with the start URL lines', () => {
    expect(composeTaskPrompt('go to apple.com and click Learn more', '', 'https://apple.com')).toBe(
      [
        'Primary instruction: go to apple.com and click Learn more',
        'Required start URL: https://apple.com',
        'First open the required URL in a new tab.',
        'Only perform the minimum actions needed and then stop.',
      ].join('\n\n'),
    );
  });

  it('includes context and click guidance in the agent instruction', () => {
    const composed = compose('click "Sign up"', 'Use the test account', 'https://shop.test');
    expect(composed.clickTarget).toBe('Sign up');
    expect(composed.agentInstruction).toBe(
      [
        'User request: click "Sign up"',
        'Context: Use the test account',
        'Open this URL first: https://shop.test',
        'Then click the UI element labeled "Sign up".',
        'If there are multiple matches, choose the most primary call-to-action.',
        'Autonomously navigate and finish the task.',
        'Stop once the request is complete.',
      ].join('\n\n'),
    );
  });

  it('is deterministic for identical inputs', () => {
    const first = compose('summarize this page', 'ctx', '');
    const second = compose('summarize this page', 'ctx', '');
    expect(second.taskPrompt).toBe(first.taskPrompt);
    expect(second.agentInstruction).toBe(first.agentInstruction);
  });

  it('phrases the external tool instruction on one line', () => {
    expect(composeExternalToolInstruction('summarize', 'https://a.test')).toBe(
      'Open https://a.test first. summarize Stop when complete.',
    );
    expect(composeExternalToolInstruction('summarize', '')).toBe('summarize Stop when complete.');
  });

  it('renders the click phrasings', () => {
    expect(actionPrompts.directClick('Learn more')).toBe('Click "Learn more"');
    expect(actionPrompts.click('Learn more')).toBe(
      'Click "Learn more" on the current page. If needed, scroll and then click exactly once.',
    );
  });
});
