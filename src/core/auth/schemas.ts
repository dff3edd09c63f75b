import { z } from 'zod';
import { FITNESS_GOALS } from '../../persistence/repositories/UserRepository.js';
import { MAX_PASSWORD_BYTES, passwordBytes } from './passwords.js';

export const usernameSchema = z
  .string()
  .trim()
  .toLowerCase()
  .min(3, 'Username must be at least 3 characters')
  .max(32, 'Username must be at most 32 characters')
  .regex(/^[a-z0-9_.-]+$/, 'Username may only contain letters, digits, "_", "." and "-"');

export const emailSchema = z.string().trim().toLowerCase().email('Please enter a valid email address');

export const passwordSchema = z
  .string()
  .min(8, 'Password must be at least 8 characters long')
  .refine(
    (password) => passwordBytes(password) <= MAX_PASSWORD_BYTES,
    `Password must be at most ${MAX_PASSWORD_BYTES} bytes long`
  );

export const heightSchema = z.number().min(100).max(250);
export const weightSchema = z.number().min(30).max(200);
export const fitnessGoalsSchema = z.array(z.enum(FITNESS_GOALS)).transform((goals) => [...new Set(goals)]);

const nameSchema = (label: string) => z.string().trim().min(1, `${label} is required`).max(60);

export const registerSchema = z
  .object({
    username: usernameSchema,
    email: emailSchema,
    password: passwordSchema,
    passwordConfirm: z.string(),
    firstName: nameSchema('First name'),
    lastName: nameSchema('Last name'),
    heightCm: heightSchema.optional(),
    weightKg: weightSchema.optional(),
    fitnessGoals: fitnessGoalsSchema.default([]),
  })
  .superRefine((body, ctx) => {
    if (body.password !== body.passwordConfirm) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['passwordConfirm'],
        message: 'Passwords do not match',
      });
    }
  });

export type RegisterInput = z.input<typeof registerSchema>;

// Login only checks shape; anything malformed fails like a wrong password
export const loginSchema = z.object({
  username: z.string().trim().toLowerCase(),
  password: z.string(),
});

export const profileUpdateSchema = z
  .object({
    firstName: nameSchema('First name').optional(),
    lastName: nameSchema('Last name').optional(),
    email: emailSchema.optional(),
    heightCm: heightSchema.optional(),
    weightKg: weightSchema.optional(),
    fitnessGoals: fitnessGoalsSchema.optional(),
  })
  .strict();

export type ProfileUpdateInput = z.input<typeof profileUpdateSchema>;

export const changePasswordSchema = z
  .object({
    currentPassword: z.string().min(1, 'Current password is required'),
    newPassword: passwordSchema,
    newPasswordConfirm: z.string(),
  })
  .superRefine((body, ctx) => {
    if (body.newPassword !== body.newPasswordConfirm) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['newPasswordConfirm'],
        message: 'New password and confirmation do not match',
      });
    }
  });

export type ChangePasswordInput = z.input<typeof changePasswordSchema>;
