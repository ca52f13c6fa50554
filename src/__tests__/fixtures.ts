import {
    calculation,
    nestedMap,
    relationship,
    resource,
    scalar,
    typedMap,
    union,
    unionField,
} from '../schema/entity.js';
import { SchemaRegistry } from '../schema/registry.js';

// Self-referential: a user's manager is a user
export const User = resource(
    'User',
    { id: 'string', name: 'string', email: scalar('string', { nullable: true }) },
    (self) => ({ manager: relationship(self, { nullable: true }) })
);

export const Address = typedMap('Address', { street: 'string', city: 'string', zip: 'string' });

export const Metadata = typedMap(
    'Metadata',
    { category: 'string', tags: scalar('string', { array: true }) },
    { address: nestedMap(Address) }
);

export const TextContent = typedMap('TextContent', { body: 'string', wordCount: 'number' });
export const ImageContent = typedMap('ImageContent', { url: 'string', width: 'number' });

export const Content = union('Content', { text: TextContent, image: ImageContent }, { tagField: 'type' });

export const Reminder = union('Reminder', {
    note: scalar('string'),
    text: TextContent,
    images: { target: ImageContent, array: true },
});

export const Summary = typedMap('Summary', { text: 'string', length: 'number' });

export const Todo = resource(
    'Todo',
    {
        id: 'string',
        title: 'string',
        completed: 'boolean',
        dueAt: scalar('datetime', { nullable: true }),
    },
    {
        author: relationship(User, { nullable: true }),
        watchers: relationship(User, { array: true }),
        addresses: nestedMap(Address, { array: true }),
        location: nestedMap(Address, { nullable: true }),
        metadata: nestedMap(Metadata),
        content: unionField(Content),
        attachments: unionField(Content, { array: true, nullable: true }),
        reminder: unionField(Reminder, { nullable: true }),
        summary: calculation(Summary, { args: { maxLength: { type: 'number' } } }),
        priorityScore: calculation('number'),
        assignee: calculation(User, { nullable: true }),
        localizedTitle: calculation('string', {
            args: {
                locale: { type: 'string' },
                fallback: { type: 'string', nullable: true, required: false },
            },
        }),
    }
);

export function buildRegistry(): SchemaRegistry {
    const registry = new SchemaRegistry();
    for (const entity of [User, Address, Metadata, TextContent, ImageContent, Content, Reminder, Summary, Todo]) {
        registry.register(entity);
    }
    registry.freeze();
    return registry;
}
