import { DOMParser, XMLSerializer } from '@xmldom/xmldom';
import { createDocumentError, DocumentErrorCode } from '../errors/index.js';

export type XmlDocument = ReturnType<DOMParser['parseFromString']>;
export type XmlElement = NonNullable<XmlDocument['documentElement']>;

export const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';

/** Escape XML special characters */
export function escapeXml(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

/** Parse an XML string, returning its root element */
export function parseXml(xmlString: string, filePath?: string): XmlElement {
  let doc: XmlDocument;
  try {
    doc = new DOMParser().parseFromString(xmlString, 'text/xml');
  } catch (error) {
    throw createDocumentError(
      DocumentErrorCode.INVALID_XML,
      `XML parse error: ${error instanceof Error ? error.message : String(error)}`,
      { filePath, cause: error },
    );
  }
  const root = doc.documentElement;
  if (!root) {
    throw createDocumentError(DocumentErrorCode.INVALID_XML, 'XML document has no root element.', {
      filePath,
    });
  }
  return root;
}

/** Serialize the document owning `root`, keeping or adding the XML declaration */
export function serializeXml(root: XmlElement): string {
  const owner = root.ownerDocument;
  const xml = new XMLSerializer().serializeToString(owner ?? root);
  return xml.startsWith('<?xml') ? xml : `${XML_DECLARATION}\n${xml}`;
}

/** All descendant elements with the given tag, in document order */
export function elementsByTag(parent: XmlElement, tagName: string): XmlElement[] {
  const list = parent.getElementsByTagName(tagName);
  const elements: XmlElement[] = [];
  for (let i = 0; i < list.length; i++) {
    const element = list.item(i);
    if (element) {
      elements.push(element);
    }
  }
  return elements;
}

export function firstElementByTag(parent: XmlElement, tagName: string): XmlElement | undefined {
  return parent.getElementsByTagName(tagName).item(0) ?? undefined;
}

/** Attribute value, or undefined when the attribute is absent */
export function attr(element: XmlElement, name: string): string | undefined {
  return element.hasAttribute(name) ? element.getAttribute(name) ?? undefined : undefined;
}
