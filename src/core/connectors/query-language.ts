const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function isIdentifier(value: string): boolean {
  return IDENTIFIER.test(value);
}

/** Single-quoted string literal with backslashes and quotes escaped. */
export function quoteLiteral(value: string): string {
  return `'${value.replace(/\\/g, "\\\\").replace(/'/g, "\\'")}'`;
}

function stripTerminator(query: string): string {
  return query.trim().replace(/;+$/, "").trimEnd();
}

export function withLimit(baseQuery: string, offset: number, pageSize: number): string {
  return `${stripTerminator(baseQuery)} LIMIT ${offset}, ${pageSize};`;
}

export function selectByEmail(module: string, email: string): string {
  return `SELECT * FROM ${module} WHERE email = ${quoteLiteral(email)} LIMIT 1;`;
}
