/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */
import fs from 'fs-extra';
import path from 'node:path';
import { MappingFileError, errorMessage } from '../errors.js';
import { type AnsiMapping, MappingParseError, parseAnsiMapping, serializeAnsiMapping } from './mapping.js';
import type { PaletteRegistry } from './palette.js';

/**
 * Write a mapping as pretty-printed JSON, creating parent directories.
 */
export async function saveAnsiMapping(filePath: string, mapping: AnsiMapping): Promise<void> {
  try {
    await fs.ensureDir(path.dirname(path.resolve(filePath)));
    await fs.writeJson(filePath, serializeAnsiMapping(mapping), { spaces: 2 });
  } catch (error) {
    throw new MappingFileError(`Failed to write mapping file: ${errorMessage(error)}`, filePath, error);
  }
}

export async function loadAnsiMapping(filePath: string, registry: PaletteRegistry): Promise<AnsiMapping> {
  if (!(await fs.pathExists(filePath))) {
    throw new MappingFileError('Mapping file not found', filePath);
  }

  let data: unknown;
  try {
    data = await fs.readJson(filePath);
  } catch (error) {
    throw new MappingFileError(`Failed to parse mapping file: ${errorMessage(error)}`, filePath, error);
  }

  try {
    return parseAnsiMapping(data, registry);
  } catch (error) {
    if (error instanceof MappingParseError) {
      throw new MappingFileError(error.message, filePath, error);
    }
    throw error;
  }
}
