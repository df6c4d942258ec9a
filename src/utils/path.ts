import fs from 'node:fs/promises';
import os from 'node:os';

export const expandPath = (input: string) => {
  if (!input.startsWith('~')) return input;
  return input.replace(/^~(?=$|\/)/, os.homedir());
};

export const ensureDir = async (input: string) => {
  await fs.mkdir(input, { recursive: true });
};
