/**
 * Form extraction from SAML HTML pages and the gateway prelogin XML
 */

import { DOMParser, type Element } from '@xmldom/xmldom';
import { ProtocolViolationError, logger } from '@gp-okta/core';

export interface SamlForm {
  /** Absolute submission URL */
  action: string;
  fields: Record<string, string>;
}

export interface PreloginResponse {
  status: string;
  /** Decoded HTML page holding the SAML request form */
  samlRequestHtml: string;
}

function parse(source: string, mimeType: 'text/html' | 'text/xml', what: string) {
  const warnings: string[] = [];
  const parser = new DOMParser({
    onError: (level: string, message: string) => {
      warnings.push(`${level}: ${message}`);
    },
  });

  try {
    const document = parser.parseFromString(source, mimeType);
    if (warnings.length > 0) {
      logger.debug({ warnings }, `[saml] ${what} parsed with warnings`);
    }
    return document;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ProtocolViolationError(`Cannot parse ${what}: ${reason}`);
  }
}

interface ElementContainer {
  getElementsByTagName(name: string): ArrayLike<Element>;
}

// HTML pages mix tag case; compare names lowercased
function elementsNamed(root: ElementContainer, name: string): Element[] {
  return Array.from(root.getElementsByTagName('*')).filter(
    element => element.nodeName.toLowerCase() === name
  );
}

/**
 * First <form> of an HTML page, with every named <input>
 *
 * @param baseUrl URL the page was fetched from; relative actions resolve against it
 */
export function extractForm(html: string, baseUrl?: string): SamlForm {
  const document = parse(html, 'text/html', 'HTML form page');

  const form = elementsNamed(document, 'form')[0];
  if (!form) {
    throw new ProtocolViolationError('No form found in response');
  }

  const rawAction = form.getAttribute('action') ?? '';
  let action: string;
  try {
    action = new URL(rawAction, baseUrl).href;
  } catch {
    throw new ProtocolViolationError(`Form action is not a valid URL: ${rawAction || '<empty>'}`);
  }

  const fields: Record<string, string> = {};
  for (const input of elementsNamed(form, 'input')) {
    const name = input.getAttribute('name');
    if (name) {
      fields[name] = input.getAttribute('value') ?? '';
    }
  }

  return { action, fields };
}

/**
 * Read a prelogin.esp reply
 *
 * @throws ProtocolViolationError on an Error status or a missing saml-request
 */
export function extractPreloginRequest(xml: string): PreloginResponse {
  const document = parse(xml, 'text/xml', 'prelogin response');
  const text = (name: string): string | undefined => {
    const element = document.getElementsByTagName(name)[0];
    return element?.textContent?.trim() || undefined;
  };

  const status = text('status') ?? 'Success';
  if (status.toLowerCase() === 'error') {
    throw new ProtocolViolationError(`Gateway prelogin failed: ${text('msg') ?? 'no message'}`, {
      status,
    });
  }

  const encoded = text('saml-request');
  if (!encoded) {
    throw new ProtocolViolationError('Prelogin response has no saml-request; is SAML enabled on the gateway?');
  }

  return { status, samlRequestHtml: Buffer.from(encoded, 'base64').toString('utf-8') };
}

/**
 * Require a field in an extracted form
 */
export function requireField(form: SamlForm, field: string, context: string): string {
  const value = form.fields[field];
  if (value === undefined) {
    throw new ProtocolViolationError(`${context} form has no ${field} field`, {
      fields: Object.keys(form.fields),
    });
  }
  return value;
}
