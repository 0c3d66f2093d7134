/**
 * 批量查询辅助
 */

import { promises as fs } from 'fs';

export interface NameConverter {
    convert(query: string): Promise<string>;
}

/** 每行一个查询，跳过空行 */
export function parseQueryLines(content: string): string[] {
    return content
        .split(/\r?\n/)
        .map(line => line.trim())
        .filter(line => line.length > 0);
}

export async function readQueryFile(filePath: string): Promise<string[]> {
    return parseQueryLines(await fs.readFile(filePath, 'utf8'));
}

/**
 * 顺序转换，保持输入顺序
 */
export async function convertAll(converter: NameConverter, queries: readonly string[]): Promise<string[]> {
    const results: string[] = [];
    for (const query of queries) {
        results.push(await converter.convert(query));
    }
    return results;
}
