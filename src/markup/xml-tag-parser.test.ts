/*
  @author Sven Wisotzky
  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { describe, it, expect } from 'vitest';
import { ROOT_TAG } from '../tags/types';
import { RecordingLogger } from '../test/recording-logger';
import { isMarkupUsable, formatMarkupIssues } from './diagnostics';
import { parseMarkup, validateMarkup } from './xml-tag-parser';

describe('parseMarkup', () => {
  it('reads the delimiter offsets of nested elements', () => {
    const result = parseMarkup('<a> <b>word</b> </a>');
    expect(result.errors).toHaveLength(0);
    expect(result.tagNames).toEqual(['a', 'b']);
    const table = result.table;
    expect(table?.size).toBe(2);
    expect(table?.tag(0)).toEqual({ id: 0, parent: ROOT_TAG, openStart: 0, openEnd: 3, closeStart: 16, closeEnd: 20 });
    expect(table?.tag(1)).toEqual({ id: 1, parent: 0, openStart: 4, openEnd: 7, closeStart: 11, closeEnd: 15 });
    expect(table?.docLength).toBe(20);
  });

  it('skips the declaration and comments and keeps attributes inside the open delimiter', () => {
    const xml = '<?xml version="1.0"?><doc id="1"><!-- note --><p>hi</p></doc>';
    const table = parseMarkup(xml).table;
    expect(table?.size).toBe(2);
    expect(table?.openStart(0)).toBe(xml.indexOf('<doc'));
    expect(table?.openEnd(0)).toBe(xml.indexOf('<!--'));
    expect(table?.closeStart(0)).toBe(xml.indexOf('</doc>'));
    expect(table?.closeEnd(0)).toBe(xml.length);
    expect(table?.openStart(1)).toBe(xml.indexOf('<p>'));
    expect(table?.openEnd(1)).toBe(xml.indexOf('hi'));
    expect(table?.closeStart(1)).toBe(xml.indexOf('</p>'));
    expect(table?.closeEnd(1)).toBe(xml.indexOf('</doc>'));
  });

  it('closes an empty element at its open delimiter end', () => {
    const table = parseMarkup('<r><br/>x</r>').table;
    expect(table?.tag(1)).toEqual({ id: 1, parent: 0, openStart: 3, openEnd: 8, closeStart: 8, closeEnd: 8 });
    expect(table?.lookupEnclosingTag(8)).toBe(0);
  });

  it('reports errors and builds no table for malformed markup', () => {
    const result = parseMarkup('<root><unclosed>');
    expect(result.errors.length).toBeGreaterThan(0);
    expect(result.table).toBeUndefined();
    expect(isMarkupUsable(result)).toBe(false);
  });

  it('logs under the markup context', () => {
    const logger = new RecordingLogger();
    parseMarkup('<a></b>', { logger });
    expect(logger.entries).toHaveLength(1);
    expect(logger.entries[0].level).toBe('warn');
    expect(logger.entries[0].context).toBe('markup');
    expect(logger.entries[0].message).toBe('markup is not well formed');
  });
});

describe('validateMarkup', () => {
  it('returns no issues for well-formed XML', () => {
    expect(validateMarkup('<a><b/></a>')).toEqual([]);
  });

  it('reports mismatched tags on their line', () => {
    const issues = validateMarkup('<a>\n</b>');
    expect(issues).toHaveLength(1);
    expect(issues[0].line).toBe(2);
  });
});

describe('isMarkupUsable', () => {
  it('returns true for well-formed markup', () => {
    expect(isMarkupUsable(parseMarkup('<a>x</a>'))).toBe(true);
  });
});

describe('formatMarkupIssues', () => {
  it('writes one issue per line', () => {
    expect(
      formatMarkupIssues([
        { line: 1, column: 4, message: 'first' },
        { line: 3, column: 1, message: 'second' },
      ])
    ).toBe('1:4 first\n3:1 second');
  });
});
