/** Display key for an author: `name <email>` when the email is known. No identity merging. */
export const authorIdentity = (name: string, email: string | null): string =>
  email !== null && email.length > 0 ? `${name} <${email}>` : name;
