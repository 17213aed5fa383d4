/**
 * Ownership token shared by a heap and every entry it creates.
 *
 * An entry is held by heap H iff its token resolves to H. Tokens form a
 * forest: union forwards the donor's token to the recipient's, so every
 * absorbed entry follows the recipient from then on (including through a
 * later clear or union of the recipient) without walking the tree.
 * Resolution compresses paths as it goes.
 */
export class HeapReference<H extends object> {
    private heap: H | null;
    private forward: HeapReference<H> | null = null;

    constructor(heap: H) {
        this.heap = heap;
    }

    /** The heap currently owning entries bound to this token, if any. */
    get owner(): H | null {
        return this.resolve().heap;
    }

    /** Detach every entry bound to this token from its heap. */
    release(): void {
        this.resolve().heap = null;
    }

    /**
     * Hand every entry bound to this token over to `target`'s owner.
     * This token must not be used for new entries afterwards.
     */
    forwardTo(target: HeapReference<H>): void {
        const from = this.resolve();
        const to = target.resolve();
        if (from === to) return;
        from.heap = null;
        from.forward = to;
    }

    private resolve(): HeapReference<H> {
        let root: HeapReference<H> = this;
        while (root.forward !== null) root = root.forward;

        let current: HeapReference<H> = this;
        while (current.forward !== null) {
            const next: HeapReference<H> = current.forward;
            current.forward = root;
            current = next;
        }
        return root;
    }
}
