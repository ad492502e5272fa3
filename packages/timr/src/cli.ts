#!/usr/bin/env node
/**
 * CLI 入口文件 - 倒计时的命令行启动点
 *
 * 去掉 node 和脚本路径，只把用户提供的参数传给 main()
 */
process.title = "timr";

import { main } from "./main.js";

main(process.argv.slice(2)).catch((error: unknown) => {
	console.error(error);
	process.exit(1);
});
