import { access, readFile, readdir, stat } from 'node:fs/promises';
import { constants, type Dirent } from 'node:fs';
import { errorMessage } from '../errors.js';

export async function pathExists(filePath: string): Promise<boolean> {
    try {
        await access(filePath);
        return true;
    } catch {
        return false;
    }
}

export async function isDirectory(filePath: string): Promise<boolean> {
    try {
        return (await stat(filePath)).isDirectory();
    } catch {
        return false;
    }
}

export async function isFile(filePath: string): Promise<boolean> {
    try {
        return (await stat(filePath)).isFile();
    } catch {
        return false;
    }
}

export async function isExecutable(filePath: string): Promise<boolean> {
    try {
        await access(filePath, constants.X_OK);
        return true;
    } catch {
        return false;
    }
}

/**
 * Directory entries sorted by name; empty when the directory is absent
 */
export async function listEntries(dirPath: string): Promise<Dirent[]> {
    try {
        const entries = await readdir(dirPath, { withFileTypes: true });
        return entries.sort((a, b) => a.name.localeCompare(b.name));
    } catch {
        return [];
    }
}

/**
 * Names of regular files in a directory with the given extension
 */
export async function listFiles(dirPath: string, extension?: string): Promise<string[]> {
    const entries = await listEntries(dirPath);
    return entries
        .filter((entry) => entry.isFile() && (!extension || entry.name.endsWith(extension)))
        .map((entry) => entry.name);
}

export async function listDirectories(dirPath: string): Promise<string[]> {
    const entries = await listEntries(dirPath);
    return entries.filter((entry) => entry.isDirectory()).map((entry) => entry.name);
}

export type JsonReadResult =
    | { status: 'ok'; value: unknown }
    | { status: 'missing' }
    | { status: 'invalid'; error: string };

/**
 * Read and parse a JSON file without throwing
 */
export async function readJsonFile(filePath: string): Promise<JsonReadResult> {
    let content: string;
    try {
        content = await readFile(filePath, 'utf-8');
    } catch {
        return { status: 'missing' };
    }

    try {
        const value: unknown = JSON.parse(content);
        return { status: 'ok', value };
    } catch (err) {
        return { status: 'invalid', error: errorMessage(err) };
    }
}

export async function readText(filePath: string): Promise<string | null> {
    try {
        return await readFile(filePath, 'utf-8');
    } catch {
        return null;
    }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
