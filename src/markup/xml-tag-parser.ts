/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import * as sax from 'sax';
import { XMLValidator } from 'fast-xml-parser';
import { ConsoleLogger } from '../common/console-logger';
import { TagTableError } from '../common/errors';
import { scopedLogger, type Logger } from '../common/logger';
import { TagTableBuilder } from '../tags/tag-table-builder';
import type { MarkupIssue, MarkupParseResult } from './types';

export interface ParseMarkupOptions {
  logger?: Logger;
}

/**
 * Well-formedness check. Returns an empty list when the text is valid XML.
 */
export function validateMarkup(text: string): MarkupIssue[] {
  const result = XMLValidator.validate(text);
  if (result === true) return [];
  return [{ line: result.err.line, column: result.err.col, message: result.err.msg }];
}

/**
 * Read the delimiter offsets of every element into a TagTable.
 * Uses sax for position tracking: `startTagPosition` is one past the `<` of the
 * delimiter being read and `position` is one past its `>`.
 */
export function parseMarkup(text: string, options: ParseMarkupOptions = {}): MarkupParseResult {
  const logger = scopedLogger(options.logger ?? new ConsoleLogger(), 'markup');
  const tagNames: string[] = [];

  const errors = validateMarkup(text);
  if (errors.length > 0) {
    logger.warn('markup is not well formed', errors[0]);
    return { table: undefined, tagNames, errors };
  }

  const builder = new TagTableBuilder();
  const parser = sax.parser(true, { position: true });
  let selfClosing = false;

  const issueAtParser = (message: string): MarkupIssue => ({
    line: parser.line + 1,
    column: parser.column + 1,
    message,
  });

  parser.onerror = (err: Error) => {
    errors.push(issueAtParser(err.message.split('\n')[0]));
    parser.resume();
  };

  parser.onopentag = (tag: sax.Tag | sax.QualifiedTag) => {
    builder.openTag(parser.startTagPosition - 1, parser.position);
    tagNames.push(tag.name);
    selfClosing = tag.isSelfClosing;
  };

  parser.onclosetag = () => {
    if (selfClosing) {
      builder.closeTag(parser.position, parser.position);
      selfClosing = false;
    } else {
      builder.closeTag(parser.startTagPosition - 1, parser.position);
    }
  };

  try {
    parser.write(text).close();
  } catch (err) {
    if (!(err instanceof TagTableError)) throw err;
    errors.push(issueAtParser(err.message));
  }

  if (errors.length > 0) {
    logger.warn('could not read tag offsets', errors[0]);
    return { table: undefined, tagNames, errors };
  }

  const table = builder.build(text.length);
  logger.debug(`read ${table.size} tags from ${text.length} characters`);
  return { table, tagNames, errors };
}
