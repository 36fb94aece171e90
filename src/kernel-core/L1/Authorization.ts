import type { ContributorView, Identity, RegistryEvent } from '../L0/Ontology.js';
import {
    enforce, OwnerGuard, IdentityGuard, RequiredTextGuard, GrantableGuard, RevocableGuard
} from '../L0/Guards.js';
import { StateModel } from '../L2/State.js';
import { ErrorCode, RegistryError } from '../Errors.js';

/**
 * Gates every change of contributor authority through the single owner.
 * Reads go against the committed state; `plan*` methods check preconditions
 * and return the event a command would commit, without changing anything.
 */
export class AuthorizationManager {
    constructor(private state: StateModel) { }

    public get owner(): Identity {
        return this.state.current.owner;
    }

    /**
     * Absence reads as unauthorized: unknown identities get ("", false).
     */
    public getContributor(identity: Identity): ContributorView {
        const c = this.state.getContributor(identity);
        return c ? { name: c.name, authorized: c.authorized } : { name: '', authorized: false };
    }

    public planGrant(caller: Identity, identity: Identity, name: string): RegistryEvent {
        enforce(
            OwnerGuard({ caller, owner: this.owner }),
            IdentityGuard({ identity, field: 'identity' }),
            RequiredTextGuard({ name }),
            GrantableGuard({ contributor: this.state.getContributor(identity) })
        );
        return { type: 'ContributorAuthorized', contributor: identity, name };
    }

    public planRevoke(caller: Identity, identity: Identity): RegistryEvent {
        enforce(
            OwnerGuard({ caller, owner: this.owner }),
            RevocableGuard({ identity, contributor: this.state.getContributor(identity) })
        );
        return { type: 'ContributorRevoked', contributor: identity };
    }

    public planTransfer(caller: Identity, newOwner: Identity): RegistryEvent {
        const owner = this.owner;
        enforce(
            OwnerGuard({ caller, owner }),
            IdentityGuard({ identity: newOwner, field: 'newOwner' })
        );
        if (newOwner === owner) {
            throw new RegistryError(ErrorCode.INVALID_ARGUMENT, 'newOwner is already the registry owner');
        }
        return { type: 'OwnershipTransferred', previousOwner: owner, newOwner };
    }
}
