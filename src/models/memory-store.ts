import type { ModelStore } from '../inference/types';

/**
 * Process-local model store
 */
export class InMemoryModelStore implements ModelStore {
	private objects = new Map<string, Buffer>();

	async get(monitorId: string): Promise<Buffer | undefined> {
		const bytes = this.objects.get(monitorId);
		return bytes ? Buffer.from(bytes) : undefined;
	}

	async put(monitorId: string, bytes: Buffer): Promise<void> {
		this.objects.set(monitorId, Buffer.from(bytes));
	}

	delete(monitorId: string): boolean {
		return this.objects.delete(monitorId);
	}

	keys(): string[] {
		return Array.from(this.objects.keys());
	}
}
