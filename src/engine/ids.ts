import { nanoid } from 'nanoid';

/** Issues ids that never repeat within one session. */
export interface IdFactory {
    next: () => string;
    /** Mark ids from a loaded snapshot as taken. */
    register: (ids: Iterable<string>) => void;
}

export function createIdFactory(generate: () => string = () => nanoid(10)): IdFactory {
    const issued = new Set<string>();

    return {
        next() {
            let id = generate();
            while (issued.has(id)) {
                id = generate();
            }
            issued.add(id);
            return id;
        },
        register(ids) {
            for (const id of ids) issued.add(id);
        },
    };
}
