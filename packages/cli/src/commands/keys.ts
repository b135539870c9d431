import { existsSync, mkdirSync, writeFileSync } from "node:fs";
import { join, resolve } from "node:path";
import { generateKeyPair, type KeyPair } from "@clearline/bank";
import { Command } from "commander";
import pc from "picocolors";

export const PRIVATE_KEY_FILE = "private.pem";
export const PUBLIC_KEY_FILE = "public.pem";

/**
 * Write a key pair as `private.pem` (mode 0600) and `public.pem`. Refuses to
 * replace existing files unless `force` is set.
 */
export function writeKeyPair(
	keys: KeyPair,
	outDir: string,
	force = false,
): { privateKeyPath: string; publicKeyPath: string } {
	const privateKeyPath = join(outDir, PRIVATE_KEY_FILE);
	const publicKeyPath = join(outDir, PUBLIC_KEY_FILE);

	if (!force) {
		for (const path of [privateKeyPath, publicKeyPath]) {
			if (existsSync(path)) throw new Error(`${path} already exists (use --force to replace it)`);
		}
	}

	mkdirSync(outDir, { recursive: true });
	writeFileSync(privateKeyPath, keys.privateKey, { mode: 0o600 });
	writeFileSync(publicKeyPath, keys.publicKey, { mode: 0o644 });
	return { privateKeyPath, publicKeyPath };
}

export const keysCommand = new Command("keys")
	.description("Generate the signing key pair of a bank instance")
	.option("-t, --type <type>", "Key type: ed25519 or rsa", "ed25519")
	.option("-o, --out <dir>", "Write private.pem and public.pem into this directory")
	.option("--force", "Replace existing key files")
	.action((options: { type: string; out?: string; force?: boolean }) => {
		if (options.type !== "ed25519" && options.type !== "rsa") {
			throw new Error(`Key type must be ed25519 or rsa, got "${options.type}"`);
		}
		const keys = generateKeyPair({ type: options.type });

		if (!options.out) {
			process.stdout.write(`${keys.privateKey}${keys.publicKey}`);
			return;
		}

		const paths = writeKeyPair(keys, resolve(options.out), options.force);
		console.error(pc.green(`Wrote ${options.type} key pair`));
		console.error(`  CLEARLINE_PRIVATE_KEY_PATH=${paths.privateKeyPath}`);
		console.error(`  CLEARLINE_PUBLIC_KEY_PATH=${paths.publicKeyPath}`);
	});
