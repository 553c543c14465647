/**
 * Authenticator demo
 *
 * Runs one full authorization cycle against the in-process network: an app asks for
 * access, the authenticator grants it, the app stores content, and the app is revoked.
 */

import { Authenticator } from '../../../libs/authenticator/authenticator.js';
import { ConfigGuard } from '../../../libs/bootstrap/config-guard.js';
import { CHUNKING_GUARDS, coreConfig } from '../../../libs/bootstrap/config/core-config.js';
import { App } from '../../../libs/context/app.js';
import { ErrorSanitizer } from '../../../libs/errors/sanitizer.js';
import { verifyAuditLog } from '../../../libs/audit/integrity.js';
import { decodeIpcMsg, encodeAuthReq } from '../../../libs/ipc/appIpc.js';
import { logger } from '../../../libs/logging/logger.js';
import { MemoryNetwork } from '../../../libs/network/memoryNetwork.js';

const APP = { id: 'net.example.notes', name: 'Notes', vendor: 'Example Vendor' };

async function main(): Promise<void> {
    ConfigGuard.enforce(CHUNKING_GUARDS);
    const config = coreConfig();
    logger.info({ retryAttempts: config.networkRetryAttempts, concurrency: config.schedulerConcurrency }, 'Demo starting');

    const network = new MemoryNetwork();
    const authenticator = await Authenticator.create(network, { bootstrapConfig: Buffer.from('demo-bootstrap') });

    const { token } = encodeAuthReq({
        app: APP,
        appContainer: true,
        containers: [{ containerName: '_documents', permissions: { read: true, insert: true, update: true } }]
    });
    const request = await authenticator.decodeRequest(token);
    if (request.kind !== 'Auth') {
        throw new Error(`Unexpected request outcome ${request.kind}`);
    }
    const outcome = decodeIpcMsg(await authenticator.grantAuth(request.requestId));
    if (outcome.kind !== 'AuthGranted') {
        throw new Error(`Unexpected grant outcome ${outcome.kind}`);
    }

    const app = App.registered(APP.id, outcome.authGranted, network);
    await app.submit('notes.write', async ({ accessContainer, collections, mdata }) => {
        if (!accessContainer) {
            throw new Error('Registered app has no access container');
        }
        const documents = await accessContainer.getContainerInfo('_documents');
        const actions = collections.newEntryActions();
        collections.insertAction(
            actions,
            mdata.encryptEntryKey(documents, Buffer.from('todo')),
            mdata.encryptEntryValue(documents, Buffer.from('buy milk'))
        );
        await mdata.mutate(documents, actions);
        collections.freeEntryActions(actions);
        logger.info({ version: await mdata.getVersion(documents) }, 'Note stored');
    });

    const address = await app.submit('notes.attach', async ({ idata }) => {
        const writer = idata.newWriter();
        await idata.write(writer, Buffer.from('attachment body'));
        return idata.close(writer, idata.newSymmetric());
    });
    logger.info({ address }, 'Attachment stored');

    await authenticator.revokeApp(APP.id);
    logger.info({ revoked: await authenticator.listRevokedApps() }, 'App revoked');

    const audit = verifyAuditLog(authenticator.audit.toJSONL());
    logger.info({ records: authenticator.audit.entries().length, valid: audit.valid }, 'Audit chain verified');

    await app.shutdown();
    await authenticator.shutdown();
}

main().catch((err: unknown) => {
    const error = ErrorSanitizer.sanitize(err, 'authenticator-demo', 'AllocationError');
    logger.fatal({ kind: error.kind, description: error.description }, 'Demo failed');
    process.exit(1);
});
