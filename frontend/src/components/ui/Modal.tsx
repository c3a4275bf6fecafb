import React from 'react';
import * as Dialog from '@radix-ui/react-dialog';
import { motion, AnimatePresence } from 'framer-motion';
import { clsx } from 'clsx';
import { X } from 'lucide-react';
import { Button, IconButton } from './Button';

export interface ModalProps {
  open: boolean;
  onOpenChange: (open: boolean) => void;
  children: React.ReactNode;
  title?: string;
  description?: React.ReactNode;
  size?: 'sm' | 'md' | 'full' | 'pane';
  showCloseButton?: boolean;
  className?: string;
  /**
   * When false the page behind stays interactive: no overlay, no focus trap,
   * and clicks outside do not close the dialog. Escape still does.
   */
  modal?: boolean;
}

const keepOpen = (event: Event) => event.preventDefault();

/**
 * Radix dialog with an animated overlay. Escape and overlay clicks close it.
 */
export const Modal: React.FC<ModalProps> = ({
  open,
  onOpenChange,
  children,
  title,
  description,
  size = 'md',
  showCloseButton = true,
  className,
  modal = true,
}) => (
  <Dialog.Root open={open} onOpenChange={onOpenChange} modal={modal}>
    <AnimatePresence>
      {open && (
        <Dialog.Portal forceMount>
          {modal && (
            <Dialog.Overlay asChild>
              <motion.div
                className="sp-modal__overlay"
                data-testid="modal-overlay"
                initial={{ opacity: 0 }}
                animate={{ opacity: 1 }}
                exit={{ opacity: 0 }}
                transition={{ duration: 0.2 }}
              />
            </Dialog.Overlay>
          )}
          <Dialog.Content
            asChild
            onInteractOutside={modal ? undefined : keepOpen}
            {...(description ? {} : { 'aria-describedby': undefined })}
          >
            <motion.div
              className={clsx('sp-modal', `sp-modal--${size}`, className)}
              initial={{ opacity: 0, scale: 0.96 }}
              animate={{ opacity: 1, scale: 1 }}
              exit={{ opacity: 0, scale: 0.96 }}
              transition={{ duration: 0.2 }}
            >
              {(title || showCloseButton) && (
                <div className="sp-modal__header">
                  <div>
                    {title && <Dialog.Title className="sp-modal__title">{title}</Dialog.Title>}
                    {description && (
                      <Dialog.Description asChild>
                        <div className="sp-modal__description">{description}</div>
                      </Dialog.Description>
                    )}
                  </div>
                  {showCloseButton && (
                    <Dialog.Close asChild>
                      <IconButton icon={<X size={18} />} aria-label="Tutup" />
                    </Dialog.Close>
                  )}
                </div>
              )}
              <div className="sp-modal__body">{children}</div>
            </motion.div>
          </Dialog.Content>
        </Dialog.Portal>
      )}
    </AnimatePresence>
  </Dialog.Root>
);

export interface ModalFooterProps {
  children: React.ReactNode;
  className?: string;
}

export const ModalFooter: React.FC<ModalFooterProps> = ({ children, className }) => (
  <div className={clsx('sp-modal__footer', className)}>{children}</div>
);

export interface ConfirmModalProps {
  open: boolean;
  onOpenChange: (open: boolean) => void;
  title: string;
  description?: React.ReactNode;
  confirmText?: string;
  cancelText?: string;
  onConfirm: () => void;
  onCancel?: () => void;
  variant?: 'primary' | 'danger';
}

export const ConfirmModal: React.FC<ConfirmModalProps> = ({
  open,
  onOpenChange,
  title,
  description,
  confirmText = 'Lanjutkan',
  cancelText = 'Batal',
  onConfirm,
  onCancel,
  variant = 'primary',
}) => {
  const handleCancel = () => {
    onCancel?.();
    onOpenChange(false);
  };

  return (
    <Modal open={open} onOpenChange={onOpenChange} title={title} description={description} size="sm" showCloseButton={false}>
      <ModalFooter>
        <Button variant="secondary" onClick={handleCancel}>
          {cancelText}
        </Button>
        <Button variant={variant} onClick={onConfirm}>
          {confirmText}
        </Button>
      </ModalFooter>
    </Modal>
  );
};
