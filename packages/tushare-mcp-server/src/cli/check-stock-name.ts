#!/usr/bin/env node

/**
 * A/H 股代码与名称转换命令行
 * 输出格式: 股票名称(代码)，每个查询一行
 */

import { Command } from 'commander';
import { createRuntime } from '../bootstrap.js';
import { loadConfig } from '../config/index.js';
import { errorMessage } from '../utils/error-handler.js';
import { convertAll, readQueryFile } from './queries.js';

const program = new Command();

program
    .name('check-stock-name')
    .description('A/H股股票代码与名称转换工具。支持单个查询或批量文件处理。输出格式: stock_name(stock_code)。')
    .argument('[query]', '单个股票代码或名称。如果使用 --file 选项，则忽略此参数。')
    .option('-f, --file <path>', '包含股票代码/名称列表的文件的路径，每行一个。')
    .action(async (query: string | undefined, options: { file?: string }) => {
        if (!query && !options.file) {
            program.outputHelp();
            program.error('\n错误：请提供单个查询或使用 --file 指定一个文件。');
        }

        const runtime = createRuntime(loadConfig());
        try {
            if (!(await runtime.tokenStore.getToken())) {
                process.stderr.write(`错误：Tushare token 未找到。请确保 ${runtime.config.tushare.envFile} 文件中已配置。\n`);
                process.exitCode = 1;
                return;
            }

            let queries: string[];
            if (options.file) {
                try {
                    queries = await readQueryFile(options.file);
                } catch (error) {
                    runtime.logger.debug('Query file read failed', { file: options.file, error: errorMessage(error) });
                    process.stderr.write(`错误: 文件未找到 -> ${options.file}\n`);
                    process.exitCode = 1;
                    return;
                }
            } else {
                queries = query ? [query] : [];
            }

            const converter = runtime.createNameConverter();
            process.stderr.write('正在加载A股和港股列表数据，请稍候...\n');
            const count = await converter.load();
            process.stderr.write(`数据加载完成，共计 ${count} 条记录。\n`);

            for (const line of await convertAll(converter, queries)) {
                process.stdout.write(`${line}\n`);
            }
        } finally {
            await runtime.close();
        }
    });

program.parseAsync(process.argv).catch(error => {
    process.stderr.write(`发生未知错误: ${errorMessage(error)}\n`);
    process.exit(1);
});
