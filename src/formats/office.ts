/**
 * Office Open XML document properties (docProps/core.xml and
 * docProps/app.xml). Identity fields are blanked in place; dates and the
 * revision counter are dropped.
 */

export const CORE_XML = 'docProps/core.xml';
export const APP_XML = 'docProps/app.xml';
export const CONTENT_TYPES = '[Content_Types].xml';

export const CORE_BLANKED = [
  'dc:creator',
  'dc:title',
  'dc:subject',
  'dc:description',
  'cp:keywords',
  'cp:lastModifiedBy',
  'cp:category',
  'cp:contentStatus',
  'dc:identifier',
  'dc:language',
  'cp:version',
] as const;

export const CORE_DROPPED = [
  'dcterms:created',
  'dcterms:modified',
  'cp:lastPrinted',
  'cp:revision',
] as const;

export const APP_BLANKED = ['Company', 'Manager', 'HyperlinkBase', 'Template'] as const;

function elementPattern(tag: string): RegExp {
  // Open tag (not self-closing), content, close tag.
  return new RegExp(`<${tag}(\\s[^>]*)?(?<!/)>[\\s\\S]*?</${tag}>`, 'g');
}

function emptyElementPattern(tag: string): RegExp {
  return new RegExp(`<${tag}(\\s[^>]*)?/>`, 'g');
}

/**
 * Empty every `<tag>` element's content, keeping its attributes.
 */
export function blankElement(xml: string, tag: string): string {
  return xml.replace(elementPattern(tag), (_match, attrs: string | undefined) => `<${tag}${attrs ?? ''}></${tag}>`);
}

/**
 * Remove every `<tag>` element, empty or not.
 */
export function dropElement(xml: string, tag: string): string {
  return xml.replace(elementPattern(tag), '').replace(emptyElementPattern(tag), '');
}

export function cleanCoreProperties(xml: string): string {
  let out = xml;
  for (const tag of CORE_BLANKED) out = blankElement(out, tag);
  for (const tag of CORE_DROPPED) out = dropElement(out, tag);
  return out;
}

export function cleanAppProperties(xml: string): string {
  let out = xml;
  for (const tag of APP_BLANKED) out = blankElement(out, tag);
  return out;
}
