import { createWorkflowHarness, WorkflowHarness } from './workflow-harness';
import { Actor } from '../src/auth/actor';
import {
  PermissionDeniedException,
  RecordNotFoundException,
  StateConflictException,
  ValidationException,
} from '../src/common/exceptions';

describe('Workflow (in-memory store)', () => {
  let h: WorkflowHarness;
  let admin: Actor;
  let teacher: Actor;
  let student: Actor;
  let subjectId: number;

  beforeEach(async () => {
    h = await createWorkflowHarness();
    admin = await h.addUser('admin', 'admin1', 'Ada Admin');
    teacher = await h.addUser('teacher', 't1', 'Tom Teacher');
    student = await h.addUser('student', 's1', 'Sara Student');
    subjectId = (await h.addSubject('Crop Science', 'Plants and soils')).id;
  });

  async function assignTeacher(): Promise<void> {
    await h.workflow.inviteTeacher(admin, subjectId, teacher.id);
    await h.workflow.respondToInvitation(teacher, subjectId, true);
  }

  it('runs the Crop Science scenario end to end', async () => {
    expect(subjectId).toBe(1);

    await h.workflow.inviteTeacher(admin, subjectId, teacher.id);
    await h.workflow.respondToInvitation(teacher, subjectId, true);

    const adminInbox = await h.notifications.list(admin);
    expect(adminInbox).toHaveLength(1);
    expect(adminInbox[0]).toMatchObject({
      userId: admin.id,
      type: 'info',
      title: 'Invitation Accepted: Crop Science',
      message: 'Teacher Tom Teacher has accepted the invitation to manage Crop Science.',
      isRead: false,
    });

    await h.workflow.requestEnrollment(student, subjectId);
    const teacherInbox = await h.notifications.list(teacher);
    expect(teacherInbox.map(n => n.title)).toEqual([
      'New Enrollment Request: Crop Science',
      'Subject Invitation: Crop Science',
    ]);
    expect(teacherInbox[0].message).toBe('Student Sara Student (s1) has requested to enroll in Crop Science.');

    const decided = await h.workflow.decideEnrollment(teacher, student.id, subjectId, true);
    expect(decided.status).toBe('approved');
    expect(decided.approvedAt).toBeInstanceOf(Date);
    expect(decided.decidedBy).toBe(teacher.id);

    const [stored] = h.repos.enrollments.all();
    expect(stored.status).toBe('approved');
    expect(stored.approvedAt).toBeInstanceOf(Date);

    const studentInbox = await h.notifications.list(student);
    expect(studentInbox).toHaveLength(1);
    expect(studentInbox[0]).toMatchObject({
      type: 'success',
      title: 'Enrollment Approved: Crop Science',
      message: 'Your enrollment request for Crop Science has been approved.',
    });

    const students = await h.access.listStudents(teacher, subjectId);
    expect(students).toHaveLength(1);
    expect(students[0]).toMatchObject({
      studentId: student.id,
      username: 's1',
      fullName: 'Sara Student',
      status: 'approved',
    });
  });

  describe('invitations', () => {
    it('rejects a second invite while the first is pending', async () => {
      await h.workflow.inviteTeacher(admin, subjectId, teacher.id);

      await expect(h.workflow.inviteTeacher(admin, subjectId, teacher.id)).rejects.toBeInstanceOf(StateConflictException);
      expect(h.repos.invitations.all()).toHaveLength(1);
      expect(await h.notifications.unreadCount(teacher)).toBe(1);
    });

    it('rejects an invite once the teacher manages the subject', async () => {
      await assignTeacher();

      await expect(h.workflow.inviteTeacher(admin, subjectId, teacher.id))
        .rejects.toThrow('Teacher already manages this subject');
    });

    it('returns NotFound when responding to an accepted invitation again', async () => {
      await assignTeacher();

      await expect(h.workflow.respondToInvitation(teacher, subjectId, true)).rejects.toBeInstanceOf(RecordNotFoundException);
      await expect(h.workflow.respondToInvitation(teacher, subjectId, false)).rejects.toBeInstanceOf(RecordNotFoundException);
      expect(h.repos.invitations.all()[0].status).toBe('accepted');
    });

    it('lets an admin re-invite after a rejection by resetting the row', async () => {
      await h.workflow.inviteTeacher(admin, subjectId, teacher.id);
      await h.workflow.respondToInvitation(teacher, subjectId, false);
      const [rejected] = h.repos.invitations.all();
      expect(rejected.status).toBe('rejected');
      expect(rejected.respondedAt).toBeInstanceOf(Date);

      const reopened = await h.workflow.inviteTeacher(admin, subjectId, teacher.id);

      expect(reopened.id).toBe(rejected.id);
      const [row] = h.repos.invitations.all();
      expect(row.status).toBe('pending');
      expect(row.respondedAt).toBeNull();
      expect(row.acceptedAt).toBeNull();
      expect(h.repos.invitations.all()).toHaveLength(1);
    });

    it('notifies every active admin when the inviting admin is deactivated', async () => {
      const other = await h.addUser('admin', 'admin2', 'Bea Admin');
      await h.workflow.inviteTeacher(admin, subjectId, teacher.id);
      await h.repos.users.update(admin.id, { isActive: false });

      await h.workflow.respondToInvitation(teacher, subjectId, false);

      expect(await h.notifications.list(admin)).toHaveLength(0);
      const inbox = await h.notifications.list(other);
      expect(inbox).toHaveLength(1);
      expect(inbox[0].title).toBe('Invitation Rejected: Crop Science');
    });

    it('refuses invitations from non-admins and to non-teachers', async () => {
      await expect(h.workflow.inviteTeacher(teacher, subjectId, teacher.id)).rejects.toBeInstanceOf(PermissionDeniedException);
      await expect(h.workflow.inviteTeacher(admin, subjectId, student.id)).rejects.toThrow(`User ${student.id} is not a teacher`);
      expect(h.repos.invitations.all()).toHaveLength(0);
    });

    it('refuses to invite a deactivated teacher', async () => {
      await h.repos.users.update(teacher.id, { isActive: false });

      const invite = h.workflow.inviteTeacher(admin, subjectId, teacher.id);

      await expect(invite).rejects.toBeInstanceOf(ValidationException);
      await expect(invite).rejects.toThrow(`Teacher ${teacher.id} is deactivated`);
      expect(h.repos.invitations.all()).toHaveLength(0);
    });

    it('removes a teacher and revokes management rights', async () => {
      await assignTeacher();
      expect(await h.access.canManageSubject(teacher, subjectId)).toBe(true);

      await h.workflow.removeTeacher(admin, subjectId, teacher.id);

      expect(await h.access.canManageSubject(teacher, subjectId)).toBe(false);
      const [latest] = await h.notifications.recent(teacher);
      expect(latest).toMatchObject({ type: 'warning', title: 'Removed from Subject: Crop Science' });
      await expect(h.workflow.removeTeacher(admin, subjectId, teacher.id)).rejects.toBeInstanceOf(RecordNotFoundException);
    });

    it('keeps the invitation when the notification cannot be written', async () => {
      jest.spyOn(h.notifications, 'emit').mockRejectedValueOnce(new Error('notifications table unavailable'));

      const invitation = await h.workflow.inviteTeacher(admin, subjectId, teacher.id);

      expect(invitation.status).toBe('pending');
      expect(h.repos.invitations.all()).toHaveLength(1);
      expect(h.repos.notifications.all()).toHaveLength(0);
    });
  });

  describe('enrollments', () => {
    it('denies a decision from a teacher without an accepted invitation', async () => {
      await h.workflow.inviteTeacher(admin, subjectId, teacher.id);
      await h.workflow.requestEnrollment(student, subjectId);

      await expect(h.workflow.decideEnrollment(teacher, student.id, subjectId, true))
        .rejects.toBeInstanceOf(PermissionDeniedException);
      expect(h.repos.enrollments.all()[0].status).toBe('pending');
    });

    it('lets only teachers decide enrollment requests', async () => {
      await assignTeacher();
      await h.workflow.requestEnrollment(student, subjectId);

      await expect(h.workflow.decideEnrollment(admin, student.id, subjectId, true))
        .rejects.toBeInstanceOf(PermissionDeniedException);
      await expect(h.workflow.decideEnrollment(student, student.id, subjectId, true))
        .rejects.toBeInstanceOf(PermissionDeniedException);
      expect(h.repos.enrollments.all()[0].status).toBe('pending');
    });

    it('filters a subject\'s students by enrollment status', async () => {
      await assignTeacher();
      const other = await h.addUser('student', 's2', 'Omar Other');
      await h.workflow.requestEnrollment(student, subjectId);
      await h.workflow.decideEnrollment(teacher, student.id, subjectId, true);
      await h.workflow.requestEnrollment(other, subjectId);

      const pending = await h.access.listStudents(teacher, subjectId, 'pending');
      const approved = await h.access.listStudents(teacher, subjectId, 'approved');
      const everyone = await h.access.listStudents(teacher, subjectId);

      expect(pending.map(view => [view.studentId, view.status])).toEqual([[other.id, 'pending']]);
      expect(approved.map(view => [view.studentId, view.status])).toEqual([[student.id, 'approved']]);
      expect(everyone.map(view => view.studentId)).toEqual([student.id, other.id]);
    });

    it('shows an approved subject to the student and hides a rejected one', async () => {
      await assignTeacher();
      const other = await h.addUser('student', 's2', 'Omar Other');

      await h.workflow.requestEnrollment(student, subjectId);
      await h.workflow.decideEnrollment(teacher, student.id, subjectId, true);
      await h.workflow.requestEnrollment(other, subjectId);
      await h.workflow.decideEnrollment(teacher, other.id, subjectId, false);

      expect((await h.access.listStudentSubjects(student)).map(s => s.subjectId)).toEqual([subjectId]);
      expect(await h.access.listStudentSubjects(other)).toEqual([]);
      expect(await h.access.canAccessSubject(other, subjectId)).toBe(false);

      const available = await h.access.listAvailableSubjects(other);
      expect(available).toEqual([
        { subjectId, name: 'Crop Science', description: 'Plants and soils', enrollmentStatus: 'rejected' },
      ]);

      const [rejection] = await h.notifications.list(other);
      expect(rejection).toMatchObject({ type: 'error', title: 'Enrollment Rejected: Crop Science' });
    });

    it('rejects a duplicate request while pending or approved', async () => {
      await assignTeacher();
      await h.workflow.requestEnrollment(student, subjectId);
      await expect(h.workflow.requestEnrollment(student, subjectId)).rejects.toThrow('Enrollment request already pending');

      await h.workflow.decideEnrollment(teacher, student.id, subjectId, true);
      await expect(h.workflow.requestEnrollment(student, subjectId)).rejects.toThrow('Already enrolled in this subject');
      expect(h.repos.enrollments.all()).toHaveLength(1);
    });

    it('lets exactly one of two simultaneous requests through', async () => {
      const outcomes = await Promise.allSettled([
        h.workflow.requestEnrollment(student, subjectId),
        h.workflow.requestEnrollment(student, subjectId),
      ]);

      const fulfilled = outcomes.filter(outcome => outcome.status === 'fulfilled');
      const rejected = outcomes.flatMap(outcome => (outcome.status === 'rejected' ? [outcome.reason] : []));
      expect(fulfilled).toHaveLength(1);
      expect(rejected).toHaveLength(1);
      expect(rejected[0]).toBeInstanceOf(StateConflictException);
      expect(h.repos.enrollments.all()).toHaveLength(1);
    });

    it('resets the same row to pending when re-requesting after a withdrawal', async () => {
      await assignTeacher();
      const first = await h.workflow.requestEnrollment(student, subjectId);
      await h.workflow.decideEnrollment(teacher, student.id, subjectId, true);

      const withdrawn = await h.workflow.withdrawEnrollment(student, subjectId);
      expect(withdrawn.status).toBe('withdrawn');
      expect(withdrawn.withdrawnAt).toBeInstanceOf(Date);
      expect(await h.access.canAccessSubject(student, subjectId)).toBe(false);

      const again = await h.workflow.requestEnrollment(student, subjectId);

      expect(again.id).toBe(first.id);
      const rows = h.repos.enrollments.all();
      expect(rows).toHaveLength(1);
      expect(rows[0]).toMatchObject({
        status: 'pending',
        approvedAt: null,
        decidedBy: null,
        withdrawnAt: null,
      });
    });

    it('returns NotFound when withdrawing without an active enrollment', async () => {
      await expect(h.workflow.withdrawEnrollment(student, subjectId)).rejects.toBeInstanceOf(RecordNotFoundException);
    });

    it('returns NotFound when deciding a request that does not exist', async () => {
      await assignTeacher();
      await expect(h.workflow.decideEnrollment(teacher, student.id, subjectId, true))
        .rejects.toThrow('No pending enrollment request found');
    });

    it('keeps pending requests of other subjects out of a teacher\'s view', async () => {
      await assignTeacher();
      const otherSubject = await h.addSubject('Animal Husbandry');
      const otherTeacher = await h.addUser('teacher', 't2', 'Ida Instructor');
      await h.workflow.inviteTeacher(admin, otherSubject.id, otherTeacher.id);
      await h.workflow.respondToInvitation(otherTeacher, otherSubject.id, true);

      await h.workflow.requestEnrollment(student, subjectId);

      expect(await h.access.listPendingRequests(otherTeacher)).toEqual([]);
      const pending = await h.access.listPendingRequests(teacher);
      expect(pending).toHaveLength(1);
      expect(pending[0]).toMatchObject({ subjectName: 'Crop Science', studentUsername: 's1', status: 'pending' });
      await expect(h.access.listStudents(otherTeacher, subjectId)).rejects.toBeInstanceOf(PermissionDeniedException);
    });
  });

  describe('notifications', () => {
    it('leaves zero unread after marking all read twice', async () => {
      await h.workflow.inviteTeacher(admin, subjectId, teacher.id);
      await h.workflow.removeTeacher(admin, subjectId, teacher.id);
      expect(await h.notifications.unreadCount(teacher)).toBe(2);

      expect(await h.notifications.markAllRead(teacher)).toBe(2);
      expect(await h.notifications.unreadCount(teacher)).toBe(0);

      expect(await h.notifications.markAllRead(teacher)).toBe(0);
      expect(await h.notifications.unreadCount(teacher)).toBe(0);
    });

    it('does not let a user mark someone else\'s notification', async () => {
      await h.workflow.inviteTeacher(admin, subjectId, teacher.id);
      const [notification] = h.repos.notifications.all();

      await expect(h.notifications.markRead(notification.id, student)).rejects.toBeInstanceOf(RecordNotFoundException);
      await h.notifications.markRead(notification.id, teacher);
      expect(h.repos.notifications.all()[0].isRead).toBe(true);
    });
  });
});
