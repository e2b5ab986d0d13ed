/**
 * 고시 HTML 본문에서 표 추출
 * - 본문 노드(#contents) 찾기
 * - div.table_frame 안의 table.b-on 수집
 * - class 없는 tr → td → p 텍스트
 */

import * as cheerio from 'cheerio';
import { isText, type AnyNode } from 'domhandler';
import { PipelineError } from './pipeline-error.js';
import type { RawTable } from './types.js';

const CONTENTS_SELECTORS = [
  'html > body.body > div.wrapper > div.main > div#contents',
  'html > body.body > div.wrapper > div.main > div.contents',
  '#contents',
  '.contents',
];

// 원문 마크업에 "table_wrpper" 오타가 섞여 있다
const TABLE_WRAPPER_SELECTOR = 'div.table_wrpper, div.table_wrapper, div.table-wrapper';

export function pickContentsNode($: cheerio.CheerioAPI): cheerio.Cheerio<AnyNode> | null {
  for (const selector of CONTENTS_SELECTORS) {
    const node = $(selector).first();
    if (node.length > 0) return node;
  }
  return null;
}

export function collectBorderedTables(
  $: cheerio.CheerioAPI,
  contents: cheerio.Cheerio<AnyNode>
): cheerio.Cheerio<AnyNode>[] {
  const tables: cheerio.Cheerio<AnyNode>[] = [];

  let blocks = contents.children('div[id]');
  if (blocks.length === 0) {
    blocks = contents.find('div[id]');
  }

  blocks.each((_, block) => {
    $(block)
      .find('div.table_frame')
      .each((_, frame) => {
        const wrappers = $(frame).find(TABLE_WRAPPER_SELECTOR);
        const scopes = wrappers.length > 0 ? wrappers.toArray() : [frame];
        for (const scope of scopes) {
          $(scope)
            .find('table.b-on')
            .each((_, table) => {
              tables.push($(table));
            });
        }
      });
  });

  return tables;
}

/**
 * 태그를 걷어낸 텍스트 조각들 (앞뒤 공백 제거, 빈 조각 제외)
 */
function strippedStrings($: cheerio.CheerioAPI, node: cheerio.Cheerio<AnyNode>): string[] {
  const out: string[] = [];
  node.contents().each((_, child) => {
    if (isText(child)) {
      const text = child.data.trim();
      if (text) out.push(text);
    } else {
      out.push(...strippedStrings($, $(child)));
    }
  });
  return out;
}

export function cellText($: cheerio.CheerioAPI, td: cheerio.Cheerio<AnyNode>): string {
  const paragraphs: string[] = [];
  td.find('p').each((_, p) => {
    const text = strippedStrings($, $(p)).join(' ').replace(/　/g, ' ').trim();
    if (text) paragraphs.push(text);
  });
  return paragraphs.join(' ');
}

export function tableRows($: cheerio.CheerioAPI, table: cheerio.Cheerio<AnyNode>): string[][] {
  const tbody = table.find('tbody').first();
  const body: cheerio.Cheerio<AnyNode> = tbody.length > 0 ? tbody : table;

  const rows: string[][] = [];
  body.children('tr').each((_, tr) => {
    const row = $(tr);
    if (row.attr('class')) return;
    rows.push(
      row
        .children('td')
        .toArray()
        .map(td => cellText($, $(td)))
    );
  });
  return rows;
}

export function extractHtmlTables(html: string, sourceUrl: string): RawTable[] {
  const $ = cheerio.load(html);
  const contents = pickContentsNode($);
  if (!contents) {
    throw new PipelineError('EXTRACTION_EMPTY', 'Contents node (id=contents / class=contents) not found');
  }

  return collectBorderedTables($, contents).map((table, order) => ({
    rows: tableRows($, table),
    sourceUrl,
    page: 1,
    order,
  }));
}
