export { Button, IconButton, buttonVariants } from './Button';
export type { ButtonProps, IconButtonProps } from './Button';

export { Modal, ModalFooter, ConfirmModal } from './Modal';
export type { ModalProps, ModalFooterProps, ConfirmModalProps } from './Modal';

export { ToastProvider, useToast } from './Toast';
export type { ToastType } from './Toast';
