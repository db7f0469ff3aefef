// =============================================================================
// Lumen Harbor Web — small shared UI pieces
// Class names are defined in styles/main.css.
// =============================================================================

export function PageHeader({ title, description }: { title: string; description?: string }) {
  return (
    <div className="page-header">
      <h1 className="page-title">{title}</h1>
      {description && <p className="page-description">{description}</p>}
    </div>
  );
}

interface SegmentedOption<T extends string> {
  value: T;
  label: string;
}

export function SegmentedControl<T extends string>({
  label,
  value,
  onChange,
  options,
}: {
  label: string;
  value: T;
  onChange: (value: T) => void;
  options: SegmentedOption<T>[];
}) {
  return (
    <div role="group" aria-label={label} className="segmented">
      {options.map((opt) => (
        <button
          key={opt.value}
          type="button"
          aria-pressed={opt.value === value}
          className={`segmented-item${opt.value === value ? ' active' : ''}`}
          onClick={() => onChange(opt.value)}
          data-testid={`segment-${opt.value}`}
        >
          {opt.label}
        </button>
      ))}
    </div>
  );
}
