import { useState, type FormEvent } from "react";
import { api, type Activity, type User } from "./api.js";
import { ActivityTable, Section, button, formatDate, input } from "./ui.js";

type Props = {
  user: User;
  activities: Activity[];
  onError: (message: string) => void;
  onStatus: (message: string) => void;
  onChanged: () => Promise<void>;
};

export function UserPanel({ user, activities, onError, onStatus, onChanged }: Props) {
  return (
    <>
      <Section title="Your account">
        <p style={{ margin: 0 }}>
          <strong>{user.fullName}</strong> ({user.email})
        </p>
        <p style={{ margin: "4px 0 0", color: "#666" }}>
          Member since {formatDate(user.createdAt)} · Last login {formatDate(user.lastLogin)}
        </p>
      </Section>

      <Section title="Recent activity">
        <ActivityTable entries={activities} />
      </Section>

      <ProfileForm user={user} onError={onError} onStatus={onStatus} onChanged={onChanged} />
      <PasswordForm onError={onError} onStatus={onStatus} onChanged={onChanged} />
    </>
  );
}

type FormProps = Omit<Props, "user" | "activities">;

export function ProfileForm({ user, onError, onStatus, onChanged }: FormProps & { user: User }) {
  const [username, setUsername] = useState(user.username);
  const [email, setEmail] = useState(user.email);
  const [firstName, setFirstName] = useState(user.firstName ?? "");
  const [lastName, setLastName] = useState(user.lastName ?? "");
  const [phone, setPhone] = useState(user.phone ?? "");

  async function save() {
    onError("");
    await api.updateProfile({ username, email, firstName, lastName, phone });
    onStatus("Profile updated successfully!");
    await onChanged();
  }

  function submit(e: FormEvent) {
    e.preventDefault();
    save().catch((err: unknown) => onError(err instanceof Error ? err.message : String(err)));
  }

  return (
    <Section title="Edit profile">
      <form onSubmit={submit} style={{ display: "grid", gap: 8 }}>
        <input style={input} value={username} onChange={(e) => setUsername(e.target.value)} placeholder="username" />
        <input style={input} value={email} onChange={(e) => setEmail(e.target.value)} placeholder="email" />
        <input style={input} value={firstName} onChange={(e) => setFirstName(e.target.value)} placeholder="first name" />
        <input style={input} value={lastName} onChange={(e) => setLastName(e.target.value)} placeholder="last name" />
        <input style={input} value={phone} onChange={(e) => setPhone(e.target.value)} placeholder="phone" />
        <button type="submit" style={button}>
          Save
        </button>
      </form>
    </Section>
  );
}

export function PasswordForm({ onError, onStatus, onChanged }: FormProps) {
  const [currentPassword, setCurrentPassword] = useState("");
  const [newPassword, setNewPassword] = useState("");
  const [confirmPassword, setConfirmPassword] = useState("");

  async function save() {
    onError("");
    const { message } = await api.changePassword(currentPassword, newPassword, confirmPassword);
    setCurrentPassword("");
    setNewPassword("");
    setConfirmPassword("");
    onStatus(message);
    await onChanged();
  }

  function submit(e: FormEvent) {
    e.preventDefault();
    save().catch((err: unknown) => onError(err instanceof Error ? err.message : String(err)));
  }

  return (
    <Section title="Change password">
      <form onSubmit={submit} style={{ display: "grid", gap: 8 }}>
        <input
          style={input}
          type="password"
          value={currentPassword}
          onChange={(e) => setCurrentPassword(e.target.value)}
          placeholder="current password"
        />
        <input
          style={input}
          type="password"
          value={newPassword}
          onChange={(e) => setNewPassword(e.target.value)}
          placeholder="new password"
        />
        <input
          style={input}
          type="password"
          value={confirmPassword}
          onChange={(e) => setConfirmPassword(e.target.value)}
          placeholder="confirm new password"
        />
        <button type="submit" style={button}>
          Change password
        </button>
      </form>
    </Section>
  );
}
