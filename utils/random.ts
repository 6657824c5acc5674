import { randomUUID } from "crypto";

function generateId(prefix?: string): string {
  const id = randomUUID();
  return prefix ? `${prefix}_${id}` : id;
}

export { generateId };
