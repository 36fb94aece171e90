import { describe, test, expect, beforeEach, jest } from '@jest/globals';
import { SpeciesRegistry } from '../Registry.js';
import type { Clock } from '../Registry.js';
import { ErrorCode } from '../Errors.js';
import { ZERO_IDENTITY } from '../L0/Ontology.js';
import type { Evidence } from '../L5/Audit.js';

const OWNER = 'f0'.repeat(32);
const ALICE = 'a1'.repeat(32);
const BOB = 'b2'.repeat(32);
const CAROL = 'c3'.repeat(32);

class ManualClock implements Clock {
    constructor(public time: number = 1000) { }
    now(): number { return this.time; }
}

const frog = { scientificName: 'Rana temporaria', habitat: 'wetlands', dataHash: 'hash1' };

describe('Species Registry', () => {
    let clock: ManualClock;
    let registry: SpeciesRegistry;

    beforeEach(async () => {
        clock = new ManualClock();
        registry = new SpeciesRegistry({ owner: OWNER, clock });
        await registry.boot();
    });

    describe('Authorization Manager', () => {
        test('never-granted identities read as unauthorized with an empty name', () => {
            expect(registry.getContributor(ALICE)).toEqual({ name: '', authorized: false });
            expect(registry.getContributor(ZERO_IDENTITY)).toEqual({ name: '', authorized: false });
        });

        test.each(['constructor', '__proto__', 'toString', 'hasOwnProperty'])(
            'inherited object key %s reads as an unknown identity',
            async (key) => {
                expect(registry.getContributor(key)).toEqual({ name: '', authorized: false });
                expect(registry.getContributorRecords(key)).toEqual([]);

                await expect(registry.revokeContributor(OWNER, key))
                    .rejects.toMatchObject({ code: ErrorCode.NOT_AUTHORIZED });
                await expect(registry.createRecord(key, frog))
                    .rejects.toMatchObject({ code: ErrorCode.UNAUTHORIZED });
            }
        );

        test('grant then revoke keeps the name and clears the flag', async () => {
            await registry.grantContributor(OWNER, ALICE, 'Lab A');
            expect(registry.getContributor(ALICE)).toEqual({ name: 'Lab A', authorized: true });

            await registry.revokeContributor(OWNER, ALICE);
            expect(registry.getContributor(ALICE)).toEqual({ name: 'Lab A', authorized: false });
        });

        test('only the owner grants or revokes', async () => {
            await expect(registry.grantContributor(ALICE, BOB, 'Lab B'))
                .rejects.toMatchObject({ code: ErrorCode.UNAUTHORIZED });

            await registry.grantContributor(OWNER, BOB, 'Lab B');
            await expect(registry.revokeContributor(ALICE, BOB))
                .rejects.toMatchObject({ code: ErrorCode.UNAUTHORIZED });
            expect(registry.getContributor(BOB).authorized).toBe(true);
        });

        test('caller authority is checked before arguments', async () => {
            await expect(registry.grantContributor(ALICE, ZERO_IDENTITY, ''))
                .rejects.toMatchObject({ code: ErrorCode.UNAUTHORIZED });
        });

        test('grant rejects the zero identity, malformed identities and empty names', async () => {
            await expect(registry.grantContributor(OWNER, ZERO_IDENTITY, 'Lab Z'))
                .rejects.toMatchObject({ code: ErrorCode.INVALID_ARGUMENT });
            await expect(registry.grantContributor(OWNER, 'alice', 'Lab A'))
                .rejects.toMatchObject({ code: ErrorCode.INVALID_ARGUMENT });
            await expect(registry.grantContributor(OWNER, ALICE, ''))
                .rejects.toMatchObject({ code: ErrorCode.INVALID_ARGUMENT });
            await expect(registry.grantContributor(OWNER, ALICE, '   '))
                .rejects.toMatchObject({ code: ErrorCode.INVALID_ARGUMENT });

            expect(registry.getContributor(ALICE)).toEqual({ name: '', authorized: false });
        });

        test('granting an authorized identity fails and changes nothing', async () => {
            await registry.grantContributor(OWNER, ALICE, 'Lab A');
            const before = registry.state.current;
            const historyLength = (await registry.Audit.getHistory()).length;

            await expect(registry.grantContributor(OWNER, ALICE, 'Lab B'))
                .rejects.toMatchObject({ code: ErrorCode.ALREADY_AUTHORIZED });

            expect(registry.state.current).toBe(before);
            expect(registry.getContributor(ALICE)).toEqual({ name: 'Lab A', authorized: true });
            expect(await registry.Audit.getHistory()).toHaveLength(historyLength);
        });

        test('revoking an identity that is not authorized fails', async () => {
            await expect(registry.revokeContributor(OWNER, BOB))
                .rejects.toMatchObject({ code: ErrorCode.NOT_AUTHORIZED });

            await registry.grantContributor(OWNER, BOB, 'Lab B');
            await registry.revokeContributor(OWNER, BOB);
            await expect(registry.revokeContributor(OWNER, BOB))
                .rejects.toMatchObject({ code: ErrorCode.NOT_AUTHORIZED });
        });

        test('a revoked contributor can be granted again under a new name', async () => {
            await registry.grantContributor(OWNER, ALICE, 'Lab A');
            await registry.revokeContributor(OWNER, ALICE);
            await registry.grantContributor(OWNER, ALICE, 'Lab A (renewed)');

            expect(registry.getContributor(ALICE)).toEqual({ name: 'Lab A (renewed)', authorized: true });
        });

        test('grant and revoke emit notifications carrying their fields', async () => {
            const seen: Evidence[] = [];
            registry.subscribe(e => seen.push(e));

            await registry.grantContributor(OWNER, ALICE, 'Lab A');
            await registry.revokeContributor(OWNER, ALICE);

            expect(seen.map(e => e.event)).toEqual([
                { type: 'ContributorAuthorized', contributor: ALICE, name: 'Lab A' },
                { type: 'ContributorRevoked', contributor: ALICE }
            ]);
            expect(seen.map(e => e.sequence)).toEqual([2, 3]);
            expect(seen.every(e => e.caller === OWNER)).toBe(true);
        });
    });

    describe('Record Lifecycle Manager', () => {
        beforeEach(async () => {
            await registry.grantContributor(OWNER, ALICE, 'Lab A');
            await registry.grantContributor(OWNER, BOB, 'Lab B');
        });

        test('createRecord by a non-contributor fails and allocates no id', async () => {
            await expect(registry.createRecord(CAROL, frog))
                .rejects.toMatchObject({ code: ErrorCode.UNAUTHORIZED });
            // The owner is not a contributor unless granted
            await expect(registry.createRecord(OWNER, frog))
                .rejects.toMatchObject({ code: ErrorCode.UNAUTHORIZED });

            expect(registry.state.current.nextRecordId).toBe(1);
            expect(await registry.createRecord(ALICE, frog)).toBe(1);
        });

        test('createRecord rejects empty fields and unknown conservation statuses', async () => {
            await expect(registry.createRecord(ALICE, { ...frog, scientificName: '' }))
                .rejects.toMatchObject({ code: ErrorCode.INVALID_ARGUMENT });
            await expect(registry.createRecord(ALICE, { ...frog, habitat: '' }))
                .rejects.toMatchObject({ code: ErrorCode.INVALID_ARGUMENT });
            await expect(registry.createRecord(ALICE, { ...frog, dataHash: '' }))
                .rejects.toMatchObject({ code: ErrorCode.INVALID_ARGUMENT });
            await expect(registry.createRecord(ALICE, { ...frog, conservationStatus: 'Fine' }))
                .rejects.toMatchObject({
                    code: ErrorCode.INVALID_ARGUMENT,
                    message: '[Registry:INVALID_ARGUMENT] Unknown conservation status: Fine',
                    metadata: { status: 'Fine' }
                });

            expect(registry.state.current.nextRecordId).toBe(1);
        });

        test('ids increase strictly from 1 across contributors', async () => {
            expect(await registry.createRecord(ALICE, frog)).toBe(1);
            expect(await registry.createRecord(BOB, { ...frog, scientificName: 'Hyla arborea' })).toBe(2);
            expect(await registry.createRecord(ALICE, { ...frog, habitat: 'ponds' })).toBe(3);

            expect(registry.getContributorRecords(ALICE)).toEqual([1, 3]);
            expect(registry.getContributorRecords(BOB)).toEqual([2]);
            expect(registry.getContributorRecords(CAROL)).toEqual([]);
        });

        test('a created record carries every field and the transaction time', async () => {
            clock.time = 2000;
            const id = await registry.createRecord(ALICE, { ...frog, conservationStatus: 'Vulnerable' });

            expect(registry.getRecord(id)).toEqual({
                id: 1,
                scientificName: 'Rana temporaria',
                habitat: 'wetlands',
                conservationStatus: 'Vulnerable',
                creator: ALICE,
                dataHash: 'hash1',
                timestamp: 2000,
                active: true
            });
        });

        test('createRecord emits RecordCreated with the creator', async () => {
            const seen: Evidence[] = [];
            registry.subscribe(e => seen.push(e));

            await registry.createRecord(ALICE, frog);

            expect(seen.map(e => e.event)).toEqual([{
                type: 'RecordCreated',
                id: 1,
                scientificName: 'Rana temporaria',
                habitat: 'wetlands',
                dataHash: 'hash1',
                creator: ALICE,
                conservationStatus: 'Least Concern'
            }]);
        });

        test('revocation stops new records but leaves authored ones alone', async () => {
            const id = await registry.createRecord(ALICE, frog);
            await registry.revokeContributor(OWNER, ALICE);

            await expect(registry.createRecord(ALICE, frog))
                .rejects.toMatchObject({ code: ErrorCode.UNAUTHORIZED });
            expect(registry.getRecord(id).active).toBe(true);
            expect(registry.getContributorRecords(ALICE)).toEqual([1]);

            // Amending is tied to authorship, not to current authorization
            await registry.updateRecord(ALICE, id, 'hash2');
            expect(registry.getRecord(id).dataHash).toBe('hash2');
        });

        test('updateRecord is creator-exclusive, even against the owner', async () => {
            const id = await registry.createRecord(ALICE, frog);

            await expect(registry.updateRecord(OWNER, id, 'hash2'))
                .rejects.toMatchObject({ code: ErrorCode.FORBIDDEN });
            await expect(registry.updateRecord(BOB, id, 'hash2'))
                .rejects.toMatchObject({ code: ErrorCode.FORBIDDEN });
            expect(registry.getRecord(id).dataHash).toBe('hash1');
        });

        test('updateRecord rejects an empty data hash', async () => {
            const id = await registry.createRecord(ALICE, frog);
            await expect(registry.updateRecord(ALICE, id, ''))
                .rejects.toMatchObject({ code: ErrorCode.INVALID_ARGUMENT });
        });

        test('update and deactivate treat absent ids as inactive', async () => {
            await expect(registry.updateRecord(ALICE, 0, 'hash2'))
                .rejects.toMatchObject({ code: ErrorCode.INACTIVE });
            await expect(registry.updateRecord(ALICE, 7, 'hash2'))
                .rejects.toMatchObject({ code: ErrorCode.INACTIVE, metadata: { id: 7 } });
            await expect(registry.deactivateRecord(OWNER, 0))
                .rejects.toMatchObject({ code: ErrorCode.INACTIVE });
            // Availability is checked before the caller relationship and the arguments
            await expect(registry.updateRecord(CAROL, 7, ''))
                .rejects.toMatchObject({ code: ErrorCode.INACTIVE });
        });

        test('the owner can retire anyone\'s record; the record is then terminal', async () => {
            const id = await registry.createRecord(ALICE, frog);

            await registry.deactivateRecord(OWNER, id);
            expect(registry.getRecord(id).active).toBe(false);

            await expect(registry.updateRecord(ALICE, id, 'hash2'))
                .rejects.toMatchObject({ code: ErrorCode.INACTIVE });
            await expect(registry.deactivateRecord(OWNER, id))
                .rejects.toMatchObject({ code: ErrorCode.INACTIVE });
            await expect(registry.deactivateRecord(ALICE, id))
                .rejects.toMatchObject({ code: ErrorCode.INACTIVE });
        });

        test('deactivation requires the creator or the owner', async () => {
            const id = await registry.createRecord(ALICE, frog);

            await expect(registry.deactivateRecord(BOB, id))
                .rejects.toMatchObject({ code: ErrorCode.FORBIDDEN });

            await registry.deactivateRecord(ALICE, id);
            expect(registry.getRecord(id).active).toBe(false);
        });

        test('getRecord fails for 0 and for ids never assigned', async () => {
            await registry.createRecord(ALICE, frog);

            expect(() => registry.getRecord(0)).toThrow(/NOT_FOUND/);
            expect(() => registry.getRecord(2)).toThrow(/NOT_FOUND/);
            expect(() => registry.getRecord(-1)).toThrow(/NOT_FOUND/);
        });

        test('inactive records stay listed and queryable', async () => {
            await registry.createRecord(ALICE, frog);
            await registry.createRecord(BOB, { ...frog, scientificName: 'Hyla arborea' });
            await registry.deactivateRecord(BOB, 2);

            expect(registry.listRecords().map(r => [r.id, r.active])).toEqual([[1, true], [2, false]]);
            expect(registry.getContributorRecords(BOB)).toEqual([2]);
            expect(registry.getRecord(2).scientificName).toBe('Hyla arborea');
        });
    });

    test('scenario: grant, create, update, owner retires, creator locked out', async () => {
        clock.time = 2000;
        await registry.grantContributor(OWNER, ALICE, 'Lab A');

        clock.time = 3000;
        const id = await registry.createRecord(ALICE, frog);
        expect(id).toBe(1);
        expect(registry.getRecord(1).timestamp).toBe(3000);

        clock.time = 4000;
        await registry.updateRecord(ALICE, 1, 'hash2');
        expect(registry.getRecord(1)).toMatchObject({
            scientificName: 'Rana temporaria',
            habitat: 'wetlands',
            dataHash: 'hash2',
            timestamp: 4000,
            active: true
        });

        clock.time = 5000;
        await registry.deactivateRecord(OWNER, 1);
        expect(registry.getRecord(1)).toMatchObject({ active: false, dataHash: 'hash2', timestamp: 4000 });

        clock.time = 6000;
        await expect(registry.updateRecord(ALICE, 1, 'hash3'))
            .rejects.toMatchObject({ code: ErrorCode.INACTIVE });

        const types = (await registry.Audit.getHistory()).map(e => e.event.type);
        expect(types).toEqual([
            'RegistryConstituted',
            'ContributorAuthorized',
            'RecordCreated',
            'RecordUpdated',
            'RecordDeactivated'
        ]);
    });

    describe('Ownership', () => {
        test('transfer moves every owner capability', async () => {
            await registry.grantContributor(OWNER, ALICE, 'Lab A');
            const id = await registry.createRecord(ALICE, frog);

            await registry.transferOwnership(OWNER, CAROL);
            expect(registry.getOwner()).toBe(CAROL);

            await expect(registry.grantContributor(OWNER, BOB, 'Lab B'))
                .rejects.toMatchObject({ code: ErrorCode.UNAUTHORIZED });
            await expect(registry.deactivateRecord(OWNER, id))
                .rejects.toMatchObject({ code: ErrorCode.FORBIDDEN });

            await registry.grantContributor(CAROL, BOB, 'Lab B');
            await registry.deactivateRecord(CAROL, id);
            expect(registry.getRecord(id).active).toBe(false);
        });

        test('transfer is owner-only and needs a distinct, non-zero identity', async () => {
            await expect(registry.transferOwnership(ALICE, ALICE))
                .rejects.toMatchObject({ code: ErrorCode.UNAUTHORIZED });
            await expect(registry.transferOwnership(OWNER, ZERO_IDENTITY))
                .rejects.toMatchObject({ code: ErrorCode.INVALID_ARGUMENT });
            await expect(registry.transferOwnership(OWNER, OWNER))
                .rejects.toMatchObject({ code: ErrorCode.INVALID_ARGUMENT });
            expect(registry.getOwner()).toBe(OWNER);
        });

        test('transfer emits OwnershipTransferred', async () => {
            const seen: Evidence[] = [];
            registry.subscribe(e => seen.push(e));
            await registry.transferOwnership(OWNER, CAROL);

            expect(seen.map(e => e.event)).toEqual([
                { type: 'OwnershipTransferred', previousOwner: OWNER, newOwner: CAROL }
            ]);
        });
    });

    describe('Lifecycle', () => {
        test('the constructor rejects a zero owner', () => {
            expect(() => new SpeciesRegistry({ owner: ZERO_IDENTITY })).toThrow(/INVALID_ARGUMENT/);
        });

        test('boot commits the genesis notification once', async () => {
            await registry.boot();
            const history = await registry.Audit.getHistory();

            expect(history).toHaveLength(1);
            expect(history[0]?.event).toEqual({ type: 'RegistryConstituted', owner: OWNER });
            expect(registry.Lifecycle).toBe('ACTIVE');
        });

        test('commands are refused before boot and after close', async () => {
            const fresh = new SpeciesRegistry({ owner: OWNER });
            await expect(fresh.grantContributor(OWNER, ALICE, 'Lab A'))
                .rejects.toMatchObject({ code: ErrorCode.REGISTRY_NOT_ACTIVE });

            await registry.close();
            expect(registry.Lifecycle).toBe('CLOSED');
            await expect(registry.grantContributor(OWNER, ALICE, 'Lab A'))
                .rejects.toMatchObject({ code: ErrorCode.REGISTRY_NOT_ACTIVE });
        });

        test('a failing listener does not undo the commit', async () => {
            const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
            registry.subscribe(() => { throw new Error('listener down'); });

            await registry.grantContributor(OWNER, ALICE, 'Lab A');

            expect(registry.getContributor(ALICE).authorized).toBe(true);
            expect(errorSpy).toHaveBeenCalled();
            errorSpy.mockRestore();
        });

        test('unsubscribed listeners stop receiving notifications', async () => {
            const seen: string[] = [];
            const unsubscribe = registry.subscribe(e => seen.push(e.event.type));

            await registry.grantContributor(OWNER, ALICE, 'Lab A');
            unsubscribe();
            await registry.revokeContributor(OWNER, ALICE);

            expect(seen).toEqual(['ContributorAuthorized']);
        });

        test('integrity holds after a mixed history', async () => {
            await registry.grantContributor(OWNER, ALICE, 'Lab A');
            await registry.createRecord(ALICE, frog);
            await registry.updateRecord(ALICE, 1, 'hash2');
            await registry.deactivateRecord(OWNER, 1);

            expect(await registry.verifyIntegrity()).toEqual({ state: true, audit: true });
            expect(registry.state.getSnapshotChain()).toHaveLength(6); // genesis + 5 commits
        });
    });
});
