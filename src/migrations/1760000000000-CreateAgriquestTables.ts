import { MigrationInterface, QueryRunner } from 'typeorm';

export class CreateAgriquestTables1760000000000 implements MigrationInterface {
    name = 'CreateAgriquestTables1760000000000';

    public async up(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`
            DO $$ BEGIN
                CREATE TYPE "users_role_enum" AS ENUM('admin', 'teacher', 'student');
            EXCEPTION
                WHEN duplicate_object THEN null;
            END $$;
        `);

        await queryRunner.query(`
            CREATE TABLE IF NOT EXISTS "users" (
                "id" SERIAL PRIMARY KEY,
                "username" VARCHAR(50) NOT NULL,
                "passwordHash" VARCHAR(255) NULL,
                "role" "users_role_enum" NOT NULL DEFAULT 'student',
                "email" VARCHAR(255) NULL,
                "fullName" VARCHAR(255) NULL,
                "isActive" BOOLEAN NOT NULL DEFAULT true,
                "lastLogin" TIMESTAMP NULL,
                "createdAt" TIMESTAMP NOT NULL DEFAULT now(),
                CONSTRAINT "UQ_users_username" UNIQUE ("username")
            )
        `);

        await queryRunner.query(`
            CREATE TABLE IF NOT EXISTS "subjects" (
                "id" SERIAL PRIMARY KEY,
                "name" VARCHAR(100) NOT NULL,
                "description" TEXT NULL,
                "created_by" INTEGER NULL,
                "createdAt" TIMESTAMP NOT NULL DEFAULT now(),
                CONSTRAINT "UQ_subjects_name" UNIQUE ("name"),
                CONSTRAINT "FK_subjects_created_by" FOREIGN KEY ("created_by") REFERENCES "users"("id") ON DELETE SET NULL
            )
        `);

        // Invitations: one row per (subject, teacher) pair
        await queryRunner.query(`
            DO $$ BEGIN
                CREATE TYPE "subject_teachers_status_enum" AS ENUM('pending', 'accepted', 'rejected');
            EXCEPTION
                WHEN duplicate_object THEN null;
            END $$;
        `);

        await queryRunner.query(`
            CREATE TABLE IF NOT EXISTS "subject_teachers" (
                "id" SERIAL PRIMARY KEY,
                "subject_id" INTEGER NOT NULL,
                "teacher_id" INTEGER NOT NULL,
                "invited_by" INTEGER NULL,
                "status" "subject_teachers_status_enum" NOT NULL DEFAULT 'pending',
                "invitedAt" TIMESTAMP NOT NULL DEFAULT now(),
                "acceptedAt" TIMESTAMP NULL,
                "respondedAt" TIMESTAMP NULL,
                CONSTRAINT "UQ_subject_teachers_pair" UNIQUE ("subject_id", "teacher_id"),
                CONSTRAINT "FK_subject_teachers_subject" FOREIGN KEY ("subject_id") REFERENCES "subjects"("id") ON DELETE CASCADE,
                CONSTRAINT "FK_subject_teachers_teacher" FOREIGN KEY ("teacher_id") REFERENCES "users"("id") ON DELETE CASCADE
            )
        `);

        // Enrollments: one row per (student, subject) pair
        await queryRunner.query(`
            DO $$ BEGIN
                CREATE TYPE "student_subjects_status_enum" AS ENUM('pending', 'approved', 'rejected', 'withdrawn');
            EXCEPTION
                WHEN duplicate_object THEN null;
            END $$;
        `);

        await queryRunner.query(`
            CREATE TABLE IF NOT EXISTS "student_subjects" (
                "id" SERIAL PRIMARY KEY,
                "student_id" INTEGER NOT NULL,
                "subject_id" INTEGER NOT NULL,
                "status" "student_subjects_status_enum" NOT NULL DEFAULT 'pending',
                "requestedAt" TIMESTAMP NOT NULL DEFAULT now(),
                "approvedAt" TIMESTAMP NULL,
                "decided_by" INTEGER NULL,
                "withdrawnAt" TIMESTAMP NULL,
                CONSTRAINT "UQ_student_subjects_pair" UNIQUE ("student_id", "subject_id"),
                CONSTRAINT "FK_student_subjects_student" FOREIGN KEY ("student_id") REFERENCES "users"("id") ON DELETE CASCADE,
                CONSTRAINT "FK_student_subjects_subject" FOREIGN KEY ("subject_id") REFERENCES "subjects"("id") ON DELETE CASCADE
            )
        `);

        await queryRunner.query(`
            DO $$ BEGIN
                CREATE TYPE "notifications_type_enum" AS ENUM('info', 'success', 'warning', 'error');
            EXCEPTION
                WHEN duplicate_object THEN null;
            END $$;
        `);

        await queryRunner.query(`
            CREATE TABLE IF NOT EXISTS "notifications" (
                "id" SERIAL PRIMARY KEY,
                "user_id" INTEGER NOT NULL,
                "title" VARCHAR(255) NOT NULL,
                "message" TEXT NOT NULL,
                "type" "notifications_type_enum" NOT NULL DEFAULT 'info',
                "isRead" BOOLEAN NOT NULL DEFAULT false,
                "createdAt" TIMESTAMP NOT NULL DEFAULT now(),
                "dispatchedAt" TIMESTAMP NULL,
                CONSTRAINT "FK_notifications_user" FOREIGN KEY ("user_id") REFERENCES "users"("id") ON DELETE CASCADE
            )
        `);

        await queryRunner.query(`
            DO $$ BEGIN
                CREATE TYPE "quizzes_difficultylevel_enum" AS ENUM('beginner', 'intermediate', 'advanced');
            EXCEPTION
                WHEN duplicate_object THEN null;
            END $$;
        `);

        await queryRunner.query(`
            CREATE TABLE IF NOT EXISTS "quizzes" (
                "id" SERIAL PRIMARY KEY,
                "title" VARCHAR(255) NOT NULL,
                "subject_id" INTEGER NOT NULL,
                "creator_id" INTEGER NOT NULL,
                "description" TEXT NULL,
                "difficultyLevel" "quizzes_difficultylevel_enum" NOT NULL DEFAULT 'beginner',
                "timeLimit" INTEGER NOT NULL DEFAULT 0,
                "deadline" TIMESTAMP NULL,
                "createdAt" TIMESTAMP NOT NULL DEFAULT now(),
                CONSTRAINT "FK_quizzes_subject" FOREIGN KEY ("subject_id") REFERENCES "subjects"("id") ON DELETE CASCADE
            )
        `);

        await queryRunner.query(`
            CREATE TABLE IF NOT EXISTS "questions" (
                "id" SERIAL PRIMARY KEY,
                "quiz_id" INTEGER NOT NULL,
                "questionText" TEXT NOT NULL,
                "options" JSONB NOT NULL,
                "correctOption" INTEGER NOT NULL,
                "explanation" TEXT NULL,
                CONSTRAINT "CHK_questions_correct_option" CHECK ("correctOption" BETWEEN 1 AND 4),
                CONSTRAINT "FK_questions_quiz" FOREIGN KEY ("quiz_id") REFERENCES "quizzes"("id") ON DELETE CASCADE
            )
        `);

        await queryRunner.query(`
            CREATE TABLE IF NOT EXISTS "results" (
                "id" SERIAL PRIMARY KEY,
                "user_id" INTEGER NOT NULL,
                "quiz_id" INTEGER NOT NULL,
                "score" INTEGER NOT NULL,
                "totalQuestions" INTEGER NOT NULL,
                "createdAt" TIMESTAMP NOT NULL DEFAULT now(),
                CONSTRAINT "UQ_results_user_quiz" UNIQUE ("user_id", "quiz_id"),
                CONSTRAINT "FK_results_quiz" FOREIGN KEY ("quiz_id") REFERENCES "quizzes"("id") ON DELETE CASCADE
            )
        `);

        await queryRunner.query(`
            CREATE TABLE IF NOT EXISTS "weaknesses" (
                "id" SERIAL PRIMARY KEY,
                "user_id" INTEGER NOT NULL,
                "subject_id" INTEGER NOT NULL,
                "weaknessType" VARCHAR(100) NOT NULL,
                "description" TEXT NULL,
                "createdAt" TIMESTAMP NOT NULL DEFAULT now(),
                CONSTRAINT "FK_weaknesses_user" FOREIGN KEY ("user_id") REFERENCES "users"("id") ON DELETE CASCADE,
                CONSTRAINT "FK_weaknesses_subject" FOREIGN KEY ("subject_id") REFERENCES "subjects"("id") ON DELETE CASCADE
            )
        `);

        await queryRunner.query(`
            CREATE INDEX IF NOT EXISTS "IDX_subject_teachers_teacher_status" ON "subject_teachers" ("teacher_id", "status");
        `);

        await queryRunner.query(`
            CREATE INDEX IF NOT EXISTS "IDX_student_subjects_subject_status" ON "student_subjects" ("subject_id", "status");
        `);

        await queryRunner.query(`
            CREATE INDEX IF NOT EXISTS "IDX_notifications_user_read" ON "notifications" ("user_id", "isRead");
        `);

        // the outbox dispatcher only scans rows not yet published
        await queryRunner.query(`
            CREATE INDEX IF NOT EXISTS "IDX_notifications_undispatched" ON "notifications" ("id") WHERE "dispatchedAt" IS NULL;
        `);

        await queryRunner.query(`
            CREATE INDEX IF NOT EXISTS "IDX_weaknesses_subject_user" ON "weaknesses" ("subject_id", "user_id");
        `);
    }

    public async down(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`DROP INDEX IF EXISTS "IDX_weaknesses_subject_user"`);
        await queryRunner.query(`DROP INDEX IF EXISTS "IDX_notifications_undispatched"`);
        await queryRunner.query(`DROP INDEX IF EXISTS "IDX_notifications_user_read"`);
        await queryRunner.query(`DROP INDEX IF EXISTS "IDX_student_subjects_subject_status"`);
        await queryRunner.query(`DROP INDEX IF EXISTS "IDX_subject_teachers_teacher_status"`);

        await queryRunner.query(`DROP TABLE IF EXISTS "weaknesses"`);
        await queryRunner.query(`DROP TABLE IF EXISTS "results"`);
        await queryRunner.query(`DROP TABLE IF EXISTS "questions"`);
        await queryRunner.query(`DROP TABLE IF EXISTS "quizzes"`);
        await queryRunner.query(`DROP TABLE IF EXISTS "notifications"`);
        await queryRunner.query(`DROP TABLE IF EXISTS "student_subjects"`);
        await queryRunner.query(`DROP TABLE IF EXISTS "subject_teachers"`);
        await queryRunner.query(`DROP TABLE IF EXISTS "subjects"`);
        await queryRunner.query(`DROP TABLE IF EXISTS "users"`);

        await queryRunner.query(`DROP TYPE IF EXISTS "quizzes_difficultylevel_enum"`);
        await queryRunner.query(`DROP TYPE IF EXISTS "notifications_type_enum"`);
        await queryRunner.query(`DROP TYPE IF EXISTS "student_subjects_status_enum"`);
        await queryRunner.query(`DROP TYPE IF EXISTS "subject_teachers_status_enum"`);
        await queryRunner.query(`DROP TYPE IF EXISTS "users_role_enum"`);
    }
}
