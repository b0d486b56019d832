/**
 * Hand-built XMP packets.
 *
 * Only the Dublin Core and Photoshop properties the tagger writes are
 * produced or read back; anything else in a foreign packet is ignored.
 */

export const XMP_NAMESPACE = 'http://ns.adobe.com/xap/1.0/';

export interface XmpFields {
  title: string;
  headline?: string;
  description: string;
  keywords: string[];
  category?: string;
  supplementalCategories?: string[];
  instructions?: string;
}

export type ParsedXmp = Partial<Omit<XmpFields, 'keywords' | 'supplementalCategories'>> & {
  keywords: string[];
  supplementalCategories: string[];
};

const INVALID_XML_CHARS = /[\u0000-\u0008\u000b\u000c\u000e-\u001f\ufffe\uffff]/g;

export function escapeXml(value: string): string {
  return value
    .replace(INVALID_XML_CHARS, '')
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

export function unescapeXml(value: string): string {
  return value.replace(/&(#x[0-9a-fA-F]+|#[0-9]+|amp|lt|gt|quot|apos);/g, (_, entity: string) => {
    switch (entity) {
      case 'amp':
        return '&';
      case 'lt':
        return '<';
      case 'gt':
        return '>';
      case 'quot':
        return '"';
      case 'apos':
        return "'";
      default:
        return String.fromCodePoint(
          entity.startsWith('#x') ? parseInt(entity.slice(2), 16) : parseInt(entity.slice(1), 10)
        );
    }
  });
}

const alt = (tag: string, value: string) =>
  `   <${tag}>\n    <rdf:Alt>\n     <rdf:li xml:lang="x-default">${escapeXml(value)}</rdf:li>\n    </rdf:Alt>\n   </${tag}>`;

const bag = (tag: string, values: string[]) =>
  `   <${tag}>\n    <rdf:Bag>\n${values
    .map((value) => `     <rdf:li>${escapeXml(value)}</rdf:li>`)
    .join('\n')}\n    </rdf:Bag>\n   </${tag}>`;

const simple = (tag: string, value: string) => `   <${tag}>${escapeXml(value)}</${tag}>`;

export function buildXmpPacket(fields: XmpFields): string {
  const properties = [alt('dc:title', fields.title)];
  if (fields.headline) properties.push(simple('photoshop:Headline', fields.headline));
  properties.push(alt('dc:description', fields.description));
  if (fields.keywords.length > 0) properties.push(bag('dc:subject', fields.keywords));
  if (fields.category) properties.push(simple('photoshop:Category', fields.category));
  if (fields.supplementalCategories?.length) {
    properties.push(bag('photoshop:SupplementalCategories', fields.supplementalCategories));
  }
  if (fields.instructions) {
    properties.push(simple('photoshop:Instructions', fields.instructions));
  }

  return [
    '<?xpacket begin="\ufeff" id="W5M0MpCehiHzreSzNTczkc9d"?>',
    '<x:xmpmeta xmlns:x="adobe:ns:meta/">',
    ' <rdf:RDF xmlns:rdf="http://www.w3.org/1999/02/22-rdf-syntax-ns#">',
    '  <rdf:Description rdf:about=""',
    '    xmlns:dc="http://purl.org/dc/elements/1.1/"',
    '    xmlns:photoshop="http://ns.adobe.com/photoshop/1.0/">',
    ...properties,
    '  </rdf:Description>',
    ' </rdf:RDF>',
    '</x:xmpmeta>',
    '<?xpacket end="w"?>',
  ].join('\n');
}

function elementBody(xml: string, tag: string): string | undefined {
  const match = new RegExp(`<${tag}(?:\\s[^>]*)?>([\\s\\S]*?)</${tag}>`).exec(xml);
  return match?.[1];
}

function listItems(body: string): string[] {
  return [...body.matchAll(/<rdf:li(?:\s[^>]*)?>([\s\S]*?)<\/rdf:li>/g)].map((match) =>
    unescapeXml(match[1])
  );
}

/** Element form first, then the attribute shorthand `dc:title="..."`. */
function readText(xml: string, tag: string): string | undefined {
  const body = elementBody(xml, tag);
  if (body !== undefined) {
    const items = listItems(body);
    return items.length > 0 ? items[0] : unescapeXml(body);
  }
  const attribute = new RegExp(`\\s${tag}="([^"]*)"`).exec(xml);
  return attribute ? unescapeXml(attribute[1]) : undefined;
}

function readList(xml: string, tag: string): string[] {
  const body = elementBody(xml, tag);
  return body === undefined ? [] : listItems(body);
}

export function parseXmpPacket(xml: string): ParsedXmp {
  return {
    title: readText(xml, 'dc:title'),
    headline: readText(xml, 'photoshop:Headline'),
    description: readText(xml, 'dc:description'),
    keywords: readList(xml, 'dc:subject'),
    category: readText(xml, 'photoshop:Category'),
    supplementalCategories: readList(xml, 'photoshop:SupplementalCategories'),
    instructions: readText(xml, 'photoshop:Instructions'),
  };
}
