import { z } from 'zod';
import { REGISTRABLE_ROLES } from '../../constants';

export const registerSchema = z.object({
  name: z.string().trim().min(1, 'The name field is required.').max(255),
  username: z.string().max(255).nullish(),
  email: z.string().trim().toLowerCase().email('The email must be a valid email address.').max(255),
  phone_number: z.string().max(20).nullish(),
  password: z.string().min(6, 'The password must be at least 6 characters.'),
  image_url: z.string().nullish(),
  location: z.string().max(255).nullish(),
  role: z.enum(REGISTRABLE_ROLES, {
    errorMap: () => ({ message: 'The selected role is invalid.' }),
  }),
});

export const loginSchema = z.object({
  email: z.string().trim().toLowerCase().email('The email must be a valid email address.'),
  password: z.string().min(1, 'The password field is required.'),
});

export const updateUserSchema = z
  .object({
    name: z.string().trim().min(1).max(255),
    username: z.string().max(255),
    phone_number: z.string().max(20),
    location: z.string().max(255),
    role: z.enum(REGISTRABLE_ROLES),
    favorites: z.array(z.string()),
  })
  .partial()
  .strip();

export const requestResetSchema = z.object({
  email: z.string().trim().toLowerCase().email('The email must be a valid email address.'),
});

export const resetPasswordSchema = z
  .object({
    email: z.string().trim().toLowerCase().email('The email must be a valid email address.'),
    otp: z.string().regex(/^\d{6}$/, 'The otp must be 6 digits.'),
    password: z.string().min(6, 'The password must be at least 6 characters.'),
    password_confirmation: z.string(),
  })
  .refine((data) => data.password === data.password_confirmation, {
    message: 'The password confirmation does not match.',
    path: ['password'],
  });

export type RegisterInput = z.infer<typeof registerSchema>;
export type UpdateUserInput = z.infer<typeof updateUserSchema>;
