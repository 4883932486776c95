/**
 * NuGet export file templates.
 *
 * A NuGet export is built from two generated files: a `.targets` redirect
 * that MSBuild imports from `build/native/<id>.targets`, and the `.nuspec`
 * manifest handed to `nuget pack`.
 */

import { join } from "node:path";
import { escapeXml } from "./xml";

export const DEFAULT_NUGET_VERSION = "1.0.0";

/**
 * Location of the MSBuild integration inside the exported tree, relative to
 * the redirect file. The redirect lands in `build/native/`, two levels below
 * the package root.
 */
export const TARGETS_REDIRECT_TARGET =
	"../../scripts/buildsystems/msbuild/vcpkg.targets";

export interface NuspecInput {
	id: string;
	version: string;
	/** Absolute path of the staged export tree */
	exportedDir: string;
	/** Absolute path of the generated `.targets` redirect */
	targetsRedirectPath: string;
}

/**
 * MSBuild project that imports the exported tree's targets when present
 */
export function createTargetsRedirect(targetPath: string): string {
	const escaped = escapeXml(targetPath);
	return `<Project ToolsVersion="4.0" xmlns="http://schemas.microsoft.com/developer/msbuild/2003">
  <Import Condition="Exists('${escaped}')" Project="${escaped}" />
</Project>
`;
}

export function createNuspec(input: NuspecInput): string {
	const id = escapeXml(input.id);
	const version = escapeXml(input.version);
	const installed = escapeXml(join(input.exportedDir, "installed", "**"));
	const scripts = escapeXml(join(input.exportedDir, "scripts", "**"));
	const root = escapeXml(join(input.exportedDir, ".vcpkg-root"));
	const redirect = escapeXml(input.targetsRedirectPath);

	return `<package>
    <metadata>
        <id>${id}</id>
        <version>${version}</version>
        <authors>vcpkg</authors>
        <description>
            Vcpkg NuGet export
        </description>
    </metadata>
    <files>
        <file src="${installed}" target="installed" />
        <file src="${scripts}" target="scripts" />
        <file src="${root}" target="" />
        <file src="${redirect}" target="build\\native\\${id}.targets" />
    </files>
</package>
`;
}
