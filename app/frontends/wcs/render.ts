import * as fs from 'fs';
import * as path from 'path';
import { promisify } from 'util';
import mustache from 'mustache';

const readFile = promisify(fs.readFile);

export type WcsTemplate = 'GetCapabilities' | 'DescribeCoverage' | 'ServiceExceptionReport';

const templates = new Map<WcsTemplate, string>();

/**
 * Escapes the characters that are significant in XML text and attribute values
 *
 * @param value - the text to escape
 */
export function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

async function getWcsResponseTemplate(name: WcsTemplate): Promise<string> {
  const cached = templates.get(name);
  if (cached !== undefined) return cached;
  const templatePath = path.join(__dirname, `templates/wcs-1.0.0/${name}.mustache.xml`);
  const template = await readFile(templatePath, { encoding: 'utf8' });
  templates.set(name, template);
  return template;
}

/**
 * Renders one of the WCS 1.0.0 XML documents
 *
 * @param name - the template to render
 * @param context - the values referenced by the template
 * @returns the XML document
 */
export async function renderToTemplate(name: WcsTemplate, context: object): Promise<string> {
  const template = await getWcsResponseTemplate(name);
  return mustache.render(template, context, {}, { escape: escapeXml });
}
