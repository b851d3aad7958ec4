import { z } from 'zod';

export const MIN_PASSWORD_LENGTH = 8;

const password = z
  .string({ required_error: 'Password is required' })
  .min(MIN_PASSWORD_LENGTH, `Password must be at least ${MIN_PASSWORD_LENGTH} characters`)
  .max(128, 'Password must be 128 characters or less');

export const createUserSchema = z.object({
  email: z
    .string({ required_error: 'Email is required' })
    .trim()
    .toLowerCase()
    .email('Enter a valid email address')
    .max(254, 'Email must be 254 characters or less'),
  username: z
    .string({ required_error: 'Username is required' })
    .trim()
    .min(1, 'Username cannot be empty')
    .max(150, 'Username must be 150 characters or less')
    .regex(/^[\w.@+-]+$/, 'Username may contain only letters, digits and @/./+/-/_'),
  first_name: z.string({ required_error: 'First name is required' }).trim().min(1, 'First name cannot be empty').max(150),
  last_name: z.string({ required_error: 'Last name is required' }).trim().min(1, 'Last name cannot be empty').max(150),
  password,
});

export const setPasswordSchema = z.object({
  current_password: z.string({ required_error: 'Current password is required' }).min(1),
  new_password: password,
});
