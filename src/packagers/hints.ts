import { join } from "node:path";

/**
 * Tell the user how to point CMake at an exported tree.
 *
 * @param prefix - Root of the exported tree as the user will see it
 */
export function printNextStepInfo(prefix: string): void {
	const toolchain = join(prefix, "scripts", "buildsystems", "vcpkg.cmake")
		.split("\\")
		.join("/");
	console.log("");
	console.log("To use the exported libraries in CMake projects use:");
	console.log(`    -DCMAKE_TOOLCHAIN_FILE=${toolchain}`);
	console.log("");
}
