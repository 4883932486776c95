import { readFile, stat } from "node:fs/promises";
import { homedir } from "node:os";
import { dirname, join, resolve } from "node:path";
import * as ini from "ini";

// =============================================================================
// Types
// =============================================================================

/**
 * Packaging tools invoked as subprocesses
 */
export interface ToolPaths {
	cmake: string;
	nuget: string;
	binarycreator: string;
	repogen: string;
}

/**
 * Config stored in ~/.vcpkg-exportrc or a project .vcpkg-exportrc (INI format)
 *
 * ```ini
 * root = /opt/vcpkg
 * triplet = x64-linux
 * outputDir = /tmp/exports
 *
 * [tools]
 * cmake = /usr/local/bin/cmake
 * nuget = /usr/local/bin/nuget
 * ```
 */
export interface FileConfig {
	root?: string;
	triplet?: string;
	outputDir?: string;
	tools?: Partial<ToolPaths>;
}

/**
 * Overrides given on the command line
 */
export interface CliConfigOverrides {
	vcpkgRoot?: string;
	triplet?: string;
	outputDir?: string;
}

/**
 * Fully resolved configuration (after cascade)
 */
export interface ResolvedConfig {
	paths: VcpkgPaths;
	defaultTriplet: string;
	outputDir: string;
	tools: ToolPaths;
}

/**
 * Well-known locations inside a vcpkg root
 */
export interface VcpkgPaths {
	root: string;
	installed: string;
	packages: string;
	ports: string;
	triplets: string;
	scripts: string;
	buildsystems: string;
}

// =============================================================================
// Constants
// =============================================================================

const CONFIG_FILE_NAME = ".vcpkg-exportrc";

const DEFAULT_TOOLS: ToolPaths = {
	cmake: "cmake",
	nuget: "nuget",
	binarycreator: "binarycreator",
	repogen: "repogen",
};

const TOOL_NAMES = [
	"cmake",
	"nuget",
	"binarycreator",
	"repogen",
] as const satisfies ReadonlyArray<keyof ToolPaths>;

const TOOL_ENV_VARS: Record<keyof ToolPaths, string> = {
	cmake: "VCPKG_CMAKE",
	nuget: "VCPKG_NUGET",
	binarycreator: "VCPKG_IFW_BINARYCREATOR",
	repogen: "VCPKG_IFW_REPOGEN",
};

function isDebug(): boolean {
	return Boolean(process.env.VCPKG_EXPORT_DEBUG);
}

/**
 * Get the user config file path (~/.vcpkg-exportrc)
 */
export function getConfigPath(): string {
	return join(homedir(), CONFIG_FILE_NAME);
}

/**
 * Derive the standard directory layout from a vcpkg root
 */
export function getVcpkgPaths(root: string): VcpkgPaths {
	const scripts = join(root, "scripts");
	return {
		root,
		installed: join(root, "installed"),
		packages: join(root, "packages"),
		ports: join(root, "ports"),
		triplets: join(root, "triplets"),
		scripts,
		buildsystems: join(scripts, "buildsystems"),
	};
}

/**
 * Default target triplet for the host platform
 */
export function getHostDefaultTriplet(
	platform: NodeJS.Platform = process.platform,
	arch: string = process.arch,
): string {
	const cpu = arch === "arm64" ? "arm64" : arch === "ia32" ? "x86" : "x64";
	switch (platform) {
		case "win32":
			return `${cpu}-windows`;
		case "darwin":
			return `${cpu}-osx`;
		default:
			return `${cpu}-linux`;
	}
}

// =============================================================================
// INI Config Functions
// =============================================================================

function readString(
	section: Record<string, unknown>,
	key: string,
): string | undefined {
	const value = section[key];
	return typeof value === "string" && value.trim() !== ""
		? value.trim()
		: undefined;
}

function isSection(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parse the contents of a .vcpkg-exportrc file
 */
export function parseConfigFile(content: string): FileConfig {
	const parsed: Record<string, unknown> = ini.parse(content);
	const config: FileConfig = {
		root: readString(parsed, "root"),
		triplet: readString(parsed, "triplet"),
		outputDir: readString(parsed, "outputDir"),
	};

	const section = parsed.tools;
	if (isSection(section)) {
		const tools: Partial<ToolPaths> = {};
		for (const tool of TOOL_NAMES) {
			const value = readString(section, tool);
			if (value) {
				tools[tool] = value;
			}
		}
		config.tools = tools;
	}

	return config;
}

async function readConfigFile(configPath: string): Promise<FileConfig | null> {
	try {
		const content = await readFile(configPath, "utf-8");
		const config = parseConfigFile(content);
		if (isDebug()) {
			console.log(
				`[config] Read ${configPath}:`,
				JSON.stringify(config, null, 2),
			);
		}
		return config;
	} catch (error) {
		if (isDebug()) {
			console.log(
				`[config] Could not read ${configPath}: ${
					error instanceof Error ? error.message : String(error)
				}`,
			);
		}
		return null;
	}
}

/**
 * Read the user config file (~/.vcpkg-exportrc)
 */
export async function readUserConfig(): Promise<FileConfig> {
	return (await readConfigFile(getConfigPath())) ?? {};
}

/**
 * Find and read project config (.vcpkg-exportrc) by searching up the
 * directory tree. Relative paths in the file resolve against its directory.
 */
export async function findProjectConfig(
	startDir: string = process.cwd(),
): Promise<FileConfig | null> {
	let currentDir = resolve(startDir);

	while (true) {
		const configPath = join(currentDir, CONFIG_FILE_NAME);
		const stats = await stat(configPath).catch(() => null);
		if (stats?.isFile() && configPath !== getConfigPath()) {
			const config = await readConfigFile(configPath);
			if (config) {
				return {
					...config,
					root: config.root ? resolve(currentDir, config.root) : undefined,
					outputDir: config.outputDir
						? resolve(currentDir, config.outputDir)
						: undefined,
				};
			}
		}

		const parent = dirname(currentDir);
		if (parent === currentDir) {
			return null;
		}
		currentDir = parent;
	}
}

/**
 * Resolve the full configuration using cascade priority:
 * 1. Command-line overrides (--vcpkg-root, --triplet, --output-dir)
 * 2. Environment variables (VCPKG_ROOT, VCPKG_DEFAULT_TRIPLET, ...)
 * 3. Project config (.vcpkg-exportrc in the working directory or above)
 * 4. User config (~/.vcpkg-exportrc)
 * 5. Defaults
 */
export async function resolveConfig(
	overrides: CliConfigOverrides = {},
): Promise<ResolvedConfig> {
	const userConfig = await readUserConfig();
	const projectConfig = await findProjectConfig();
	const env = process.env;

	const root = resolve(
		overrides.vcpkgRoot ??
			env.VCPKG_ROOT ??
			projectConfig?.root ??
			userConfig.root ??
			process.cwd(),
	);

	const defaultTriplet =
		overrides.triplet ??
		env.VCPKG_DEFAULT_TRIPLET ??
		projectConfig?.triplet ??
		userConfig.triplet ??
		getHostDefaultTriplet();

	const outputDir = resolve(
		overrides.outputDir ??
			env.VCPKG_EXPORT_OUTPUT_DIR ??
			projectConfig?.outputDir ??
			userConfig.outputDir ??
			root,
	);

	const tools: ToolPaths = { ...DEFAULT_TOOLS };
	for (const tool of TOOL_NAMES) {
		const value =
			env[TOOL_ENV_VARS[tool]] ??
			projectConfig?.tools?.[tool] ??
			userConfig.tools?.[tool];
		if (value) {
			tools[tool] = value;
		}
	}

	if (isDebug()) {
		console.log("[config] Resolved config:");
		console.log(`[config]   root: ${root}`);
		console.log(`[config]   defaultTriplet: ${defaultTriplet}`);
		console.log(`[config]   outputDir: ${outputDir}`);
		console.log(`[config]   tools: ${JSON.stringify(tools)}`);
	}

	return {
		paths: getVcpkgPaths(root),
		defaultTriplet: defaultTriplet.toLowerCase(),
		outputDir,
		tools,
	};
}
