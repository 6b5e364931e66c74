/**
 * Tests for fenced code block extraction
 */

import { describe, expect, it } from 'vitest';
import { combineCodeBlocks, extractCode, extractCodeBlocks } from '../core/correction/index.js';

const PYTHON_TAGS = ['python', 'py'];

describe('extractCodeBlocks', () => {
  it('should return every tagged block in order', () => {
    // Given: a reply with prose before two python blocks
    const reply = 'print(1)\n```python\nX=1\n```\n```python\nY=2\n```';

    // When
    const blocks = extractCodeBlocks(reply, PYTHON_TAGS);

    // Then
    expect(blocks).toEqual(['X=1', 'Y=2']);
    expect(combineCodeBlocks(blocks)).toBe('X=1\n\n\nY=2');
  });

  it('should ignore untagged blocks and blocks of another language', () => {
    const reply = '```\nplain\n```\n```javascript\nlet a = 1;\n```\n```py\nZ=3\n```';

    expect(extractCodeBlocks(reply, PYTHON_TAGS)).toEqual(['Z=3']);
  });

  it('should match the info tag case-insensitively and ignore trailing info words', () => {
    const reply = '```Python title="fix"\nimport os\nprint(os.sep)\n```';

    expect(extractCodeBlocks(reply, PYTHON_TAGS)).toEqual(['import os\nprint(os.sep)']);
  });

  it('should keep indentation inside the block', () => {
    const reply = '```python\ndef f():\n    return 1\n```';

    expect(extractCodeBlocks(reply, PYTHON_TAGS)).toEqual(['def f():\n    return 1']);
  });

  it('should drop empty and unterminated blocks', () => {
    const reply = '```python\n\n```\n```python\nA=1\n```\n```python\nB=2';

    expect(extractCodeBlocks(reply, PYTHON_TAGS)).toEqual(['A=1']);
  });

  it('should accept CRLF line endings', () => {
    const reply = '```python\r\nA=1\r\n```\r\n';

    expect(extractCodeBlocks(reply, PYTHON_TAGS)).toEqual(['A=1']);
  });
});

describe('extractCode', () => {
  it('should return null when no block matches', () => {
    expect(extractCode('I cannot help with that.', PYTHON_TAGS)).toBeNull();
  });

  it('should join several blocks with the block separator', () => {
    const reply = '```js\nconst a = 1;\n```\ntext\n```javascript\nconsole.log(a);\n```';

    expect(extractCode(reply, ['javascript', 'js'])).toBe('const a = 1;\n\n\nconsole.log(a);');
  });
});
