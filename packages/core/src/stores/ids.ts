const ID_CHARS = '0123456789abcdefghijklmnopqrstuvwxyz';
export const ID_LENGTH = 6;

/** Generate a random base-36 id */
export function generateId(length = ID_LENGTH): string {
  let id = '';
  for (let i = 0; i < length; i++) {
    id += ID_CHARS[Math.floor(Math.random() * ID_CHARS.length)];
  }
  return id;
}

/** Draw ids until one is not already taken */
export function generateUniqueId(isTaken: (id: string) => boolean, length = ID_LENGTH): string {
  let id = generateId(length);
  while (isTaken(id)) {
    id = generateId(length);
  }
  return id;
}
