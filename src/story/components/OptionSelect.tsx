import { cn } from "@/shared/lib/utils";

export interface OptionSelectProps<T extends string> {
  id: string;
  label: string;
  value: T;
  options: readonly T[];
  /** Receives the raw select value; callers normalise it. */
  onChange: (value: string) => void;
  disabled?: boolean;
  className?: string;
}

function capitalise(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1).replace(/-/g, " ");
}

/** Labelled native select over a fixed set of string options. */
export function OptionSelect<T extends string>({
  id,
  label,
  value,
  options,
  onChange,
  disabled,
  className,
}: OptionSelectProps<T>) {
  return (
    <div className={cn("flex flex-col gap-1.5", className)}>
      <label htmlFor={id} className="text-xs font-medium text-muted-foreground uppercase tracking-wider">
        {label}
      </label>
      <select
        id={id}
        value={value}
        disabled={disabled}
        onChange={(e) => onChange(e.target.value)}
        className="h-10 rounded-md border border-input bg-background px-3 text-sm focus-visible:outline-none focus-visible:ring-2 focus-visible:ring-ring disabled:opacity-50"
      >
        {options.map((option) => (
          <option key={option} value={option}>
            {capitalise(option)}
          </option>
        ))}
      </select>
    </div>
  );
}
