export interface ParsedAddress {
  displayName: string;
  email: string;
  domain: string;
}

/**
 * Split a From header such as `"Acme Careers" <jobs@acme.com>` into its parts.
 * Missing parts come back as empty strings.
 */
export function parseAddress(header: string): ParsedAddress {
  const value = header.trim();
  if (!value) {
    return { displayName: '', email: '', domain: '' };
  }

  let displayName = '';
  let email = '';

  const bracketed = value.match(/^(.*?)\s*<([^>]+)>\s*$/);
  if (bracketed) {
    displayName = bracketed[1];
    email = bracketed[2];
  } else if (value.includes('@')) {
    email = value;
  } else {
    displayName = value;
  }

  displayName = displayName.trim().replace(/^["']+|["']+$/g, '').trim();
  email = email.trim().toLowerCase();
  const at = email.lastIndexOf('@');
  const domain = at >= 0 ? email.slice(at + 1) : '';

  return { displayName, email, domain };
}

/**
 * Second-level label of a domain: `mail.jobs.acmecorp.co.uk` -> `acmecorp`
 */
export function registrableLabel(domain: string): string {
  const labels = domain.toLowerCase().split('.').filter(Boolean);
  if (labels.length === 0) {
    return '';
  }
  if (labels.length === 1) {
    return labels[0];
  }
  const secondLevelSuffixes = ['co', 'com', 'org', 'net', 'ac', 'gov', 'edu'];
  const candidateIndex = labels.length >= 3 && secondLevelSuffixes.includes(labels[labels.length - 2])
    ? labels.length - 3
    : labels.length - 2;
  return labels[candidateIndex];
}
