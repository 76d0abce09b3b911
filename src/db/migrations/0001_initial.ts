import type { Migration } from "../../types/database";

export const migration: Migration = {
  version: 1,
  name: "initial",
  description: "Library schema: classes, students, books, checkouts, accounts and book search index",
  up: `
CREATE TABLE IF NOT EXISTS classes (
    id INTEGER PRIMARY KEY,
    teacher_name TEXT,
    name TEXT NOT NULL UNIQUE
);

CREATE TABLE IF NOT EXISTS students (
    id INTEGER PRIMARY KEY,
    fax_id TEXT UNIQUE,
    name TEXT NOT NULL,
    class_id INTEGER,
    FOREIGN KEY (class_id) REFERENCES classes(id)
);

CREATE TABLE IF NOT EXISTS books (
    id INTEGER PRIMARY KEY,
    localnumber TEXT NOT NULL UNIQUE,
    title TEXT NOT NULL,
    subtitle TEXT,
    author TEXT NOT NULL,
    call1 TEXT,
    call2 TEXT,
    publisher TEXT,
    published TEXT,
    isbn TEXT,
    booklocation TEXT,
    cover_image BLOB
);

CREATE TABLE IF NOT EXISTS checkouts (
    id INTEGER PRIMARY KEY,
    student_id INTEGER NOT NULL,
    book_id INTEGER NOT NULL,
    checkout_date DATE DEFAULT CURRENT_DATE,
    return_date DATE,
    FOREIGN KEY (student_id) REFERENCES students(id),
    FOREIGN KEY (book_id) REFERENCES books(id)
);

CREATE TABLE IF NOT EXISTS uauth (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    username TEXT UNIQUE NOT NULL,
    password TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS uauth_cookies (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id INTEGER NOT NULL,
    cookie TEXT NOT NULL,
    FOREIGN KEY (user_id) REFERENCES uauth(id)
);

CREATE VIRTUAL TABLE IF NOT EXISTS books_fts USING fts5(
    title, subtitle, author, localnumber, booklocation,
    tokenize = 'trigram'
);

CREATE TRIGGER IF NOT EXISTS books_ad AFTER DELETE ON books BEGIN
    DELETE FROM books_fts WHERE localnumber = OLD.localnumber;
END;

CREATE TRIGGER IF NOT EXISTS books_ai AFTER INSERT ON books BEGIN
    INSERT INTO books_fts (title, subtitle, author, localnumber, booklocation)
    VALUES (NEW.title, NEW.subtitle, NEW.author, NEW.localnumber, NEW.booklocation);
END;

CREATE TRIGGER IF NOT EXISTS books_au AFTER UPDATE OF title, subtitle, author, booklocation ON books BEGIN
    UPDATE books_fts SET
        title = NEW.title,
        subtitle = NEW.subtitle,
        author = NEW.author,
        booklocation = NEW.booklocation
    WHERE localnumber = NEW.localnumber;
END;

CREATE TABLE IF NOT EXISTS schema_version (
    version INTEGER PRIMARY KEY,
    applied_at TEXT DEFAULT (datetime('now'))
);
`,
};
