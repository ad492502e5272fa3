/**
 * @file 配置管理模块
 *
 * 从 <configDir>/timr.json 读取命名的倒计时 profile：
 *
 * ```json
 * { "profiles": [{ "name": "tea", "duration": "3m" }] }
 * ```
 *
 * 配置目录可通过 TIMR_CONFIG_DIR 环境变量自定义，默认为 ~/.config
 */
import { existsSync, readFileSync } from "fs";
import { homedir } from "os";
import { dirname, join } from "path";
import { fileURLToPath } from "url";
import { type Static, Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { parseDuration } from "./duration.js";
import { ConfigError } from "./errors.js";
import { logDebug, logWarning } from "./log.js";

export const CONFIG_FILE_NAME = "timr.json";

const __dirname = dirname(fileURLToPath(import.meta.url));

/**
 * 获取包根目录：从当前文件所在目录向上查找 package.json，
 * 同时适用于 src/（tsx、vitest）和编译后的 dist/
 */
export function getPackageDir(): string {
	let dir = __dirname;
	while (dir !== dirname(dir)) {
		if (existsSync(join(dir, "package.json"))) {
			return dir;
		}
		dir = dirname(dir);
	}
	return __dirname;
}

/** 从 package.json 读取名称和版本号 */
export function getPackageInfo(): { name: string; version: string } {
	const packageJson: unknown = JSON.parse(readFileSync(join(getPackageDir(), "package.json"), "utf-8"));
	if (
		typeof packageJson === "object" &&
		packageJson !== null &&
		"name" in packageJson &&
		"version" in packageJson &&
		typeof packageJson.name === "string" &&
		typeof packageJson.version === "string"
	) {
		return { name: packageJson.name, version: packageJson.version };
	}
	return { name: "timr", version: "0.0.0" };
}

const ProfileSchema = Type.Object({
	name: Type.String({ minLength: 1 }),
	duration: Type.String({ minLength: 1 }),
});

const ConfigSchema = Type.Object({
	profiles: Type.Optional(Type.Array(ProfileSchema)),
});

export type Profile = Static<typeof ProfileSchema>;
export type Config = Static<typeof ConfigSchema>;

/**
 * 获取配置目录路径
 * 优先使用 TIMR_CONFIG_DIR 环境变量，默认为 ~/.config
 */
export const getConfigDir = (env: NodeJS.ProcessEnv = process.env): string => {
	return env.TIMR_CONFIG_DIR || join(homedir(), ".config");
};

export const getConfigPath = (env: NodeJS.ProcessEnv = process.env): string => {
	return join(getConfigDir(env), CONFIG_FILE_NAME);
};

/**
 * 加载并校验配置文件
 * @throws ConfigError 文件不存在、JSON 无效或结构不符合时
 */
export const loadConfig = (configPath: string = getConfigPath()): Config => {
	if (!existsSync(configPath)) {
		throw new ConfigError(`${configPath} does not exist`);
	}

	let data: unknown;
	try {
		data = JSON.parse(readFileSync(configPath, "utf-8"));
	} catch (e) {
		throw new ConfigError(`Failed to parse config file ${configPath}: ${e instanceof Error ? e.message : e}`, {
			cause: e,
		});
	}

	if (!Value.Check(ConfigSchema, data)) {
		const first = Value.Errors(ConfigSchema, data).First();
		const where = first?.path || "/";
		throw new ConfigError(`Invalid config file ${configPath}: ${where} ${first?.message ?? "is invalid"}`);
	}

	return data;
};

/**
 * 按名称查找 profile
 * @throws ConfigError 配置中没有 profile 或没有匹配的名称时
 */
export const findProfile = (config: Config, name: string): Profile => {
	const profiles = config.profiles;
	if (!profiles || profiles.length === 0) {
		throw new ConfigError("Config does not contain any profiles");
	}

	const matches = profiles.filter((profile) => profile.name === name);
	if (matches.length === 0) {
		throw new ConfigError(`No profile found matching ${name}`);
	}
	if (matches.length > 1) {
		logWarning(`Multiple profiles named ${name}, using the first`);
	}
	return matches[0];
};

/**
 * 将命令行参数解析为秒数
 * 以数字开头的参数（以及空字符串）直接按时长解析，否则作为 profile 名称从配置文件中查找
 */
export const resolveDuration = (token: string, configPath: string = getConfigPath()): number => {
	if (token === "" || /^[0-9]/.test(token)) {
		return parseDuration(token);
	}

	const profile = findProfile(loadConfig(configPath), token);
	logDebug(`Using profile ${profile.name} (${profile.duration})`);
	return parseDuration(profile.duration);
};
