/**
 * Wire schemas for IPC messages. Binary fields travel as base64 and are parsed into Buffers.
 */

import { z } from 'zod';
import { IPC_ERROR_CODES } from '../errors/IpcError.js';
import { MDataInfo, MDataInfoSchema } from '../mutableData/mdataInfo.js';

const U32_MAX = 0xffff_ffff;

const base64Buffer = z.string().transform(value => Buffer.from(value, 'base64'));

const key32 = base64Buffer.refine(key => key.length === 32, { message: 'Key must be 32 bytes' });

export const RequestIdSchema = z.number().int().min(1).max(U32_MAX);

export const PermissionRequestSchema = z.object({
    read: z.boolean().optional(),
    insert: z.boolean().optional(),
    update: z.boolean().optional(),
    delete: z.boolean().optional(),
    managePermissions: z.boolean().optional()
}).strict();

export const AppExchangeInfoSchema = z.object({
    id: z.string().min(1),
    scope: z.string().optional(),
    name: z.string(),
    vendor: z.string()
});

const ContainerPermissionSchema = z.object({
    containerName: z.string().min(1),
    permissions: PermissionRequestSchema
});

export const IpcReqSchema = z.discriminatedUnion('type', [
    z.object({
        type: z.literal('Auth'),
        req: z.object({
            app: AppExchangeInfoSchema,
            appContainer: z.boolean(),
            containers: z.array(ContainerPermissionSchema)
        })
    }),
    z.object({
        type: z.literal('Containers'),
        req: z.object({ app: AppExchangeInfoSchema, containers: z.array(ContainerPermissionSchema) })
    }),
    z.object({
        type: z.literal('Unregistered'),
        req: z.object({ extraData: base64Buffer })
    }),
    z.object({
        type: z.literal('ShareMData'),
        req: z.object({
            app: AppExchangeInfoSchema,
            mdata: z.array(z.object({
                typeTag: z.number().int().nonnegative(),
                name: base64Buffer.refine(name => name.length === 32, { message: 'Record name must be 32 bytes' }),
                permissions: PermissionRequestSchema
            }))
        })
    })
]);

export const IpcErrorSchema = z.object({
    code: z.enum(IPC_ERROR_CODES),
    message: z.string().optional()
});

function resultSchema<T extends z.ZodTypeAny>(value: T) {
    return z.discriminatedUnion('ok', [
        z.object({ ok: z.literal(true), value }),
        z.object({ ok: z.literal(false), error: IpcErrorSchema })
    ]);
}

export const AppKeysSchema = z.object({
    ownerKey: key32,
    encKey: key32,
    signPk: key32,
    signSk: key32,
    encPk: key32,
    encSk: key32
});

export const AccessContInfoSchema = z.object({
    contentAddress: base64Buffer.refine(name => name.length === 32, { message: 'Record name must be 32 bytes' }),
    typeTag: z.number().int().nonnegative(),
    nonce: base64Buffer.refine(nonce => nonce.length === 12, { message: 'Nonce must be 12 bytes' })
});

export const ContainerAccessSchema = z.object({
    info: MDataInfoSchema.transform(parsed => MDataInfo.fromJSON(parsed)),
    permissions: PermissionRequestSchema
});

export const AccessContainerEntrySchema = z.array(z.tuple([z.string(), ContainerAccessSchema]))
    .transform(pairs => new Map(pairs));

export const IpcRespSchema = z.discriminatedUnion('type', [
    z.object({
        type: z.literal('Auth'),
        result: resultSchema(z.object({
            appKeys: AppKeysSchema,
            bootstrapConfig: base64Buffer,
            accessContainer: AccessContInfoSchema,
            accessContainerEntry: AccessContainerEntrySchema
        }))
    }),
    z.object({ type: z.literal('Containers'), result: resultSchema(z.null()) }),
    z.object({ type: z.literal('Unregistered'), result: resultSchema(base64Buffer) }),
    z.object({ type: z.literal('ShareMData'), result: resultSchema(z.null()) })
]);

export const IpcMsgSchema = z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('Req'), requestId: RequestIdSchema, request: IpcReqSchema }),
    z.object({ kind: z.literal('Resp'), requestId: RequestIdSchema, response: IpcRespSchema }),
    z.object({ kind: z.literal('Revoked'), appId: z.string().min(1) }),
    z.object({ kind: z.literal('Err'), error: IpcErrorSchema })
]);
