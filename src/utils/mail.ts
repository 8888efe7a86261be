import nodemailer from 'nodemailer';
import { emailConfig, appConfig } from '../connections/config/app.config';
import { logger } from './logging';

const transporter = nodemailer.createTransport({
  host: emailConfig.host,
  port: emailConfig.port,
  secure: emailConfig.port === 465,
  auth: {
    user: emailConfig.user,
    pass: emailConfig.pass,
  },
});

const escapeHtml = (value: string) =>
  value.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;');

export const renderResetOtpEmail = (name: string, otp: string): string => `
  <div style="font-family: Arial, sans-serif; max-width: 600px; margin: 0 auto;">
    <h2 style="color: #2f6b2f;">Password reset</h2>
    <p>Hello ${escapeHtml(name)},</p>
    <p>Your password reset code is: <strong style="font-size: 24px; letter-spacing: 4px;">${otp}</strong></p>
    <p style="color: #999; font-size: 12px;">This code expires in ${appConfig.otpExpiresMinutes} minutes.</p>
    <p style="color: #999; font-size: 12px;">If you did not request a reset, you can ignore this e-mail.</p>
  </div>
`;

export const sendPasswordResetOtp = async (to: string, name: string, otp: string): Promise<void> => {
  if (!emailConfig.user || !emailConfig.pass) {
    logger.warn('SMTP not configured, reset code not sent', { to });
    throw new Error('Email service is not configured');
  }

  await transporter.sendMail({
    from: emailConfig.from,
    to,
    subject: 'Your password reset code',
    html: renderResetOtpEmail(name, otp),
  });

  logger.info('Password reset e-mail sent', { to });
};
