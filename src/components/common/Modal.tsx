import { useEffect, useId, type ReactNode } from "react";

const MAX_WIDTH_CLASSES = {
  sm: "max-w-sm",
  md: "max-w-md",
  lg: "max-w-lg",
} as const;

interface ModalProps {
  isOpen: boolean;
  title: string;
  onClose: () => void;
  children: ReactNode;
  maxWidth?: keyof typeof MAX_WIDTH_CLASSES;
}

export function Modal({ isOpen, title, onClose, children, maxWidth = "md" }: ModalProps) {
  const titleId = useId();

  useEffect(() => {
    if (!isOpen) return;
    const onKeyDown = (e: KeyboardEvent) => {
      if (e.key === "Escape") onClose();
    };
    document.addEventListener("keydown", onKeyDown);
    return () => document.removeEventListener("keydown", onKeyDown);
  }, [isOpen, onClose]);

  if (!isOpen) return null;

  return (
    <div
      className="fixed inset-0 bg-rk-bg-overlay/50 flex items-center justify-center z-50"
      onClick={(e) => {
        if (e.target === e.currentTarget) onClose();
      }}
      data-testid="modal-backdrop"
    >
      <div
        role="dialog"
        aria-modal="true"
        aria-labelledby={titleId}
        className={`bg-rk-bg-surface border border-rk-border-default rounded-lg p-6 w-full ${MAX_WIDTH_CLASSES[maxWidth]}`}
      >
        <h3 id={titleId} className="text-lg font-semibold mb-4">
          {title}
        </h3>
        {children}
      </div>
    </div>
  );
}
