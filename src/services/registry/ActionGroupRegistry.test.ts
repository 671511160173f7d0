import { ActionGroupRegistry } from './ActionGroupRegistry';
import { ActionGroup, Receiver, Severity } from './types';
import { NotFoundError, ValidationError } from '../../utils/errors';

const opsEmail: Receiver = { kind: 'email', name: 'oncall', address: 'ops@example.com' };
const opsSms: Receiver = { kind: 'sms', name: 'pager', countryCode: '1', number: '5550100' };
const dbaEmail: Receiver = { kind: 'email', name: 'dba', address: 'dba@example.com' };
const hook: Receiver = { kind: 'webhook', name: 'hook', uri: 'https://hooks.example.com/a', useCommonSchema: true };

function createGroup(id: string, overrides: Partial<ActionGroup> = {}): ActionGroup {
  return {
    id,
    name: `${id} name`,
    shortName: id,
    receivers: [opsEmail],
    ...overrides,
  };
}

describe('ActionGroupRegistry', () => {
  let registry: ActionGroupRegistry;

  beforeEach(() => {
    registry = new ActionGroupRegistry();
  });

  describe('register', () => {
    it('should store a group under version 1', () => {
      const stored = registry.register(createGroup('ops'));
      expect(stored.version).toBe(1);
      expect(registry.resolve('ops').shortName).toBe('ops');
    });

    it('should reject a shortName used by another group', () => {
      registry.register(createGroup('ops', { shortName: 'team' }));

      expect(() => registry.register(createGroup('dba', { shortName: 'TEAM' })))
        .toThrow(ValidationError);
      expect(() => registry.resolve('dba')).toThrow(NotFoundError);
    });

    it('should reject a shortName longer than 12 characters', () => {
      expect(() => registry.register(createGroup('ops', { shortName: 'thirteen-char' })))
        .toThrow('shortName must be at most 12 characters');
    });

    it('should reject a malformed receiver', () => {
      const group = createGroup('ops', {
        receivers: [{ kind: 'webhook', name: 'hook', uri: 'hooks/relative', useCommonSchema: false }],
      });

      expect(() => registry.register(group)).toThrow('Webhook URI must be an absolute HTTP or HTTPS URL');
    });

    it('should create a new version when an existing group changes', () => {
      registry.register(createGroup('ops'));
      const updated = registry.register(createGroup('ops', { receivers: [opsEmail, opsSms] }));

      expect(updated.version).toBe(2);
      expect(registry.getVersions('ops').map(v => v.version)).toEqual([1, 2]);
      expect(registry.resolve('ops').receivers).toHaveLength(2);
    });

    it('should keep the version when the content is unchanged', () => {
      registry.register(createGroup('ops'));
      const again = registry.register(createGroup('ops'));

      expect(again.version).toBe(1);
      expect(registry.getVersions('ops')).toHaveLength(1);
    });
  });

  describe('resolve', () => {
    it('should throw NotFoundError for an unknown id', () => {
      expect(() => registry.resolve('missing')).toThrow('Action group missing not found');
    });
  });

  describe('listReceiversFor', () => {
    beforeEach(() => {
      registry.register(createGroup('ops', { receivers: [opsEmail, opsSms] }));
      registry.register(createGroup('dba', { receivers: [dbaEmail, { ...opsEmail, name: 'ops again' }] }));
      registry.register(createGroup('esc', { receivers: [hook, opsSms] }));
    });

    it('should return the deduplicated union in first-seen order', () => {
      const receivers = registry.listReceiversFor(3, ['ops', 'dba']);
      expect(receivers).toEqual([opsEmail, opsSms, dbaEmail]);
    });

    it('should visit a group referenced twice only once', () => {
      expect(registry.listReceiversFor(3, ['ops', 'ops'])).toEqual([opsEmail, opsSms]);
    });

    it('should append escalation groups for the severity', () => {
      registry.setEscalations(new Map<Severity, string[]>([[0, ['esc']]]));

      expect(registry.listReceiversFor(0, ['ops'])).toEqual([opsEmail, opsSms, hook]);
      expect(registry.listReceiversFor(2, ['ops'])).toEqual([opsEmail, opsSms]);
    });

    it('should throw for an unknown group id', () => {
      expect(() => registry.listReceiversFor(2, ['nope'])).toThrow(NotFoundError);
    });
  });

  describe('setEscalations', () => {
    it('should reject unknown group ids', () => {
      expect(() => registry.setEscalations(new Map<Severity, string[]>([[1, ['ghost']]])))
        .toThrow('Escalation for severity 1 references unknown action group "ghost"');
    });

    it('should survive later registrations', () => {
      registry.register(createGroup('ops'));
      registry.register(createGroup('esc', { receivers: [hook] }));
      registry.setEscalations(new Map<Severity, string[]>([[0, ['esc']]]));
      registry.register(createGroup('dba', { receivers: [dbaEmail] }));

      expect(registry.snapshot().escalationsFor(0)).toEqual(['esc']);
    });
  });

  describe('snapshots', () => {
    it('should not expose later updates to an earlier snapshot', () => {
      registry.register(createGroup('ops'));
      const before = registry.snapshot();

      registry.register(createGroup('ops', { receivers: [dbaEmail] }));

      expect(before.resolve('ops').receivers).toEqual([opsEmail]);
      expect(registry.snapshot().resolve('ops').receivers).toEqual([dbaEmail]);
      expect(registry.snapshot().revision).toBe(before.revision + 1);
    });

    it('should freeze stored groups', () => {
      const stored = registry.register(createGroup('ops'));
      expect(Object.isFrozen(stored)).toBe(true);
      expect(Object.isFrozen(stored.receivers)).toBe(true);
    });
  });

  describe('replaceAll', () => {
    it('should drop missing groups and version changed ones', () => {
      registry.register(createGroup('ops'));
      registry.register(createGroup('dba', { receivers: [dbaEmail] }));

      registry.replaceAll([createGroup('ops', { receivers: [opsSms] })]);

      expect(registry.resolve('ops').version).toBe(2);
      expect(registry.snapshot().has('dba')).toBe(false);
    });
  });

  describe('validate', () => {
    it('should collect every issue rather than stopping at the first', () => {
      const issues = ActionGroupRegistry.validate(
        createGroup('', {
          shortName: '',
          receivers: [{ kind: 'email', name: 'x', address: '' }, { kind: 'sms', name: 'y', countryCode: '1', number: 'abc' }],
        }),
        [],
        'actionGroups[0]',
      );

      expect(issues.map(i => i.field)).toEqual([
        'actionGroups[0].id',
        'actionGroups[0].shortName',
        'actionGroups[0].receivers[0].address',
        'actionGroups[0].receivers[1].number',
      ]);
    });
  });
});
